/**
 * Branded numeric types.
 *
 * Vertices returned by the graph algorithms are `Vertex`, and slots of the
 * implicit range-query tree are `NodeSlot`. Both are plain integers at
 * runtime; the brand keeps a slot number from being read as a vertex id.
 *
 * ```typescript
 * const v = vertex(3);
 * // Type error: a NodeSlot is not a Vertex
 * const wrong: Vertex = leftChild(ROOT_SLOT);
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

interface Brand<B> {
  readonly [brand]: B;
}

type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Brands
// =============================================================================

/**
 * Zero-based vertex id in a graph.
 */
export type Vertex = Branded<number, 'Vertex'>;

/**
 * Position in the implicit binary tree of a range-query tree.
 * The root is 1; children of `v` are `2v` and `2v + 1`.
 */
export type NodeSlot = Branded<number, 'NodeSlot'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a Vertex from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function vertex(value: number): Vertex {
  return value as Vertex;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check that a value is an integer in `[0, size - 1]`.
 * Rejects NaN, infinities and fractional values.
 */
export function isIndexWithin(value: number, size: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < size;
}

/**
 * Check if a value can be used as a container size (non-negative integer).
 */
export function isValidSize(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

// =============================================================================
// Implicit Tree Navigation
// =============================================================================

export const ROOT_SLOT: NodeSlot = 1 as NodeSlot;

export function leftChild(slot: NodeSlot): NodeSlot {
  return (slot * 2) as NodeSlot;
}

export function rightChild(slot: NodeSlot): NodeSlot {
  return (slot * 2 + 1) as NodeSlot;
}

/**
 * Midpoint of the inclusive range `[lo, hi]`, rounded down.
 * Written as `lo + (hi - lo) / 2` so it never exceeds `hi`.
 */
export function midpoint(lo: number, hi: number): number {
  return lo + Math.floor((hi - lo) / 2);
}
