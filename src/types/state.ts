/**
 * State types for every structure in the library.
 *
 * Unlike plain snapshots, these states are owned by exactly one instance and
 * mutated in place by their update operations. Read-only views are exposed
 * through the interfaces in `structures.ts`.
 */

import type { Vertex } from './branded.ts';

// =============================================================================
// Monoid
// =============================================================================

/**
 * An associative merge operation together with its identity element.
 *
 * Laws (not checked at runtime):
 * - `merge(merge(a, b), c) === merge(a, merge(b, c))`
 * - `merge(identity, x) === x` and `merge(x, identity) === x`
 *
 * Commutativity is not required; structures always combine the left operand
 * before the right one.
 */
export interface Monoid<T> {
  readonly merge: (left: T, right: T) => T;
  readonly identity: T;
}

// =============================================================================
// Range Query Tree
// =============================================================================

/**
 * Backing storage of a range-query tree.
 *
 * `nodes` is an implicit binary tree of length `4 * size`: slot 1 is the root
 * covering `[0, size - 1]`, slot `v` has children `2v` and `2v + 1`, and the
 * range a slot covers is derived from the recursion, never stored.
 * Slot 0 and slots the recursion never reaches hold `monoid.identity`.
 */
export interface RangeQueryTreeState<T> {
  readonly size: number;
  readonly nodes: T[];
  readonly monoid: Monoid<T>;
}

// =============================================================================
// Disjoint Set
// =============================================================================

export interface DisjointSetState {
  readonly parent: Int32Array;
  /** Set size, valid only at root positions */
  readonly setSize: Int32Array;
  /** Number of distinct sets */
  count: number;
}

// =============================================================================
// Graph
// =============================================================================

/**
 * Adjacency-list graph over vertices `0..vertexCount - 1`.
 * Neighbor lists keep insertion order; traversals visit them in that order.
 */
export interface Graph {
  readonly vertexCount: number;
  readonly undirected: boolean;
  readonly adjacency: readonly Vertex[][];
}

export interface GraphConfig {
  /** Add the reverse of every edge (default: false) */
  undirected: boolean;
}

// =============================================================================
// Lowest Common Ancestor
// =============================================================================

/**
 * Binary-lifting table over a rooted tree.
 * `up[k][v]` is the 2^k-th ancestor of `v`; the root is its own ancestor.
 * Vertices unreachable from the root have depth -1.
 */
export interface LcaIndex {
  readonly root: Vertex;
  readonly vertexCount: number;
  readonly levels: number;
  readonly depth: Int32Array;
  readonly up: readonly Int32Array[];
}

export interface LcaConfig {
  /** Root vertex of the tree (default: 0) */
  root: number;
}

// =============================================================================
// Cycle Detection
// =============================================================================

/**
 * DFS vertex color: white (unvisited), gray (on the stack), black (finished).
 */
export type VertexColor = 'white' | 'gray' | 'black';

export type CycleDetectorConfig = GraphConfig;
