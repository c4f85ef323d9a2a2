/**
 * Public object interfaces for the library's structures.
 * Factories in `src/structures` and `src/graphs` return these.
 */

import type { Graph } from './state.ts';
import type { Vertex } from './branded.ts';
import type { ConstCost, LinearCost, LogCost } from './cost.ts';

// =============================================================================
// Listener Types
// =============================================================================

/**
 * Fired after a successful point update of a range-query tree.
 */
export interface UpdateEvent<T> {
  readonly position: number;
  readonly previous: T;
  readonly value: T;
}

export type UpdateListener<T> = (event: UpdateEvent<T>) => void;

/**
 * Unsubscribe function returned by subscribe.
 */
export type Unsubscribe = () => void;

// =============================================================================
// Range Query Tree
// =============================================================================

/**
 * Segment tree with point update over a fixed-length sequence.
 *
 * Not safe for interleaved use from several logical callers: serialize
 * access externally if needed.
 */
export interface RangeQueryTree<T> {
  /** Number of elements, fixed at construction */
  readonly size: number;

  /**
   * Aggregate of the elements in `[l, r]`, inclusive, combined left to right.
   * @throws OutOfRangeError if `l > r` or either bound is outside `[0, size - 1]`
   */
  query(l: number, r: number): LogCost<T>;

  /**
   * Replace the element at `position`.
   * @throws OutOfRangeError if `position` is outside `[0, size - 1]`
   */
  update(position: number, value: T): void;

  /**
   * Current element at `position`.
   * @throws OutOfRangeError if `position` is outside `[0, size - 1]`
   */
  get(position: number): LogCost<T>;

  /** Aggregate of the whole sequence, or the identity when empty. */
  total(): ConstCost<T>;

  /** Current logical sequence. */
  toArray(): LinearCost<T[]>;

  /**
   * Subscribe to successful updates.
   * @returns Unsubscribe function
   */
  subscribe(listener: UpdateListener<T>): Unsubscribe;
}

// =============================================================================
// Disjoint Set
// =============================================================================

export interface DisjointSet {
  readonly size: number;
  /** Number of distinct sets */
  readonly count: number;

  /** Representative of the set containing `x`. */
  find(x: number): number;

  /**
   * Merge the sets containing `a` and `b`.
   * @returns true if two distinct sets were merged
   */
  union(a: number, b: number): boolean;

  connected(a: number, b: number): boolean;

  /** Size of the set containing `x`. */
  sizeOf(x: number): number;

  /** Members of every set, each ascending, ordered by smallest member. */
  groups(): LinearCost<number[][]>;
}

// =============================================================================
// Cycle Detector
// =============================================================================

export interface CycleDetector {
  readonly graph: Graph;

  /**
   * Add an edge `u -> v` (and `v -> u` for undirected detectors).
   * @throws OutOfRangeError if either endpoint is not a vertex
   */
  addEdge(u: number, v: number): void;

  /**
   * Find one cycle as a closed walk `[s, ..., s]`, or `[]` if the graph is acyclic.
   */
  findCycle(): LinearCost<Vertex[]>;
}
