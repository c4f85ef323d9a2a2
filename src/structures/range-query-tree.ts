/**
 * Generic range-query tree (segment tree with point update).
 *
 * The tree is an implicit complete binary tree stored in a flat array:
 * slot 1 covers `[0, n - 1]`, and a slot covering `[tl, tr]` with midpoint
 * `tm` has its left child at `2v` over `[tl, tm]` and its right child at
 * `2v + 1` over `[tm + 1, tr]`. Every internal slot holds
 * `merge(left, right)`, left operand first, so non-commutative monoids
 * aggregate in sequence order.
 *
 * Cost typing: every result leaves through a `$(bound, $cost(value))`
 * boundary (see `src/types/cost.ts`).
 */

import type { Monoid, RangeQueryTreeState } from '../types/state.ts';
import type { RangeQueryTree, UpdateListener, Unsubscribe } from '../types/structures.ts';
import { $, $cost, type ConstCost, type LinearCost, type LogCost } from '../types/cost.ts';
import { ROOT_SLOT, leftChild, midpoint, rightChild, type NodeSlot } from '../types/branded.ts';
import { assertIndex, assertRange } from '../types/errors.ts';

// =============================================================================
// Recursive Engine
// =============================================================================

function buildSlot<T>(
  nodes: T[],
  sequence: readonly T[],
  merge: Monoid<T>['merge'],
  v: NodeSlot,
  tl: number,
  tr: number
): void {
  if (tl === tr) {
    nodes[v] = sequence[tl];
    return;
  }
  const tm = midpoint(tl, tr);
  const left = leftChild(v);
  const right = rightChild(v);
  buildSlot(nodes, sequence, merge, left, tl, tm);
  buildSlot(nodes, sequence, merge, right, tm + 1, tr);
  nodes[v] = merge(nodes[left], nodes[right]);
}

/**
 * Aggregate `[l, r]` inside the slot covering `[tl, tr]`.
 * An empty sub-range (`l > r` after clamping) contributes the identity, so
 * both halves can be merged unconditionally.
 */
function querySlot<T>(
  state: RangeQueryTreeState<T>,
  v: NodeSlot,
  tl: number,
  tr: number,
  l: number,
  r: number
): T {
  if (l > r) return state.monoid.identity;
  if (l === tl && r === tr) return state.nodes[v];

  const tm = midpoint(tl, tr);
  const leftResult = querySlot(state, leftChild(v), tl, tm, l, Math.min(r, tm));
  const rightResult = querySlot(state, rightChild(v), tm + 1, tr, Math.max(l, tm + 1), r);
  return state.monoid.merge(leftResult, rightResult);
}

/**
 * Overwrite the leaf for `position` and recompute its ancestors on unwind.
 * Returns the value the leaf held before.
 */
function updateSlot<T>(
  state: RangeQueryTreeState<T>,
  v: NodeSlot,
  tl: number,
  tr: number,
  position: number,
  value: T
): T {
  const { nodes } = state;
  if (tl === tr) {
    const previous = nodes[v];
    nodes[v] = value;
    return previous;
  }

  const tm = midpoint(tl, tr);
  const left = leftChild(v);
  const right = rightChild(v);
  const previous = position <= tm
    ? updateSlot(state, left, tl, tm, position, value)
    : updateSlot(state, right, tm + 1, tr, position, value);
  nodes[v] = state.monoid.merge(nodes[left], nodes[right]);
  return previous;
}

function leafValue<T>(state: RangeQueryTreeState<T>, position: number): T {
  let v = ROOT_SLOT;
  let tl = 0;
  let tr = state.size - 1;
  while (tl !== tr) {
    const tm = midpoint(tl, tr);
    if (position <= tm) {
      v = leftChild(v);
      tr = tm;
    } else {
      v = rightChild(v);
      tl = tm + 1;
    }
  }
  return state.nodes[v];
}

function collectLeaves<T>(state: RangeQueryTreeState<T>, v: NodeSlot, tl: number, tr: number, out: T[]): void {
  if (tl === tr) {
    out.push(state.nodes[v]);
    return;
  }
  const tm = midpoint(tl, tr);
  collectLeaves(state, leftChild(v), tl, tm, out);
  collectLeaves(state, rightChild(v), tm + 1, tr, out);
}

// =============================================================================
// Pure Operations
// =============================================================================

/**
 * Build the backing state for `sequence`. The sequence is copied.
 * An empty sequence yields a state with no slots; every query on it fails.
 */
export function buildRangeQueryTree<T>(
  sequence: readonly T[],
  monoid: Monoid<T>
): LinearCost<RangeQueryTreeState<T>> {
  const size = sequence.length;
  const nodes = new Array<T>(4 * size).fill(monoid.identity);
  if (size > 0) {
    buildSlot(nodes, sequence, monoid.merge, ROOT_SLOT, 0, size - 1);
  }
  return $('O(n)', $cost<RangeQueryTreeState<T>>({ size, nodes, monoid }));
}

/**
 * Aggregate of the elements in `[l, r]`, inclusive.
 * @throws OutOfRangeError if `l > r` or either bound lies outside `[0, size - 1]`
 */
export function queryRange<T>(state: RangeQueryTreeState<T>, l: number, r: number): LogCost<T> {
  assertRange('query', l, r, state.size);
  return $('O(log n)', $cost(querySlot(state, ROOT_SLOT, 0, state.size - 1, l, r)));
}

/**
 * Replace the element at `position` in place and return the value it held.
 * @throws OutOfRangeError if `position` lies outside `[0, size - 1]`
 */
export function updatePoint<T>(state: RangeQueryTreeState<T>, position: number, value: T): LogCost<T> {
  assertIndex('update', 'position', position, state.size);
  return $('O(log n)', $cost(updateSlot(state, ROOT_SLOT, 0, state.size - 1, position, value)));
}

/**
 * Current element at `position`.
 * @throws OutOfRangeError if `position` lies outside `[0, size - 1]`
 */
export function getPoint<T>(state: RangeQueryTreeState<T>, position: number): LogCost<T> {
  assertIndex('get', 'position', position, state.size);
  return $('O(log n)', $cost(leafValue(state, position)));
}

/**
 * Aggregate of the whole sequence; the identity when the tree is empty.
 */
export function totalOf<T>(state: RangeQueryTreeState<T>): ConstCost<T> {
  return $('O(1)', $cost(state.size === 0 ? state.monoid.identity : state.nodes[ROOT_SLOT]));
}

/**
 * Current logical sequence, left to right.
 */
export function leavesOf<T>(state: RangeQueryTreeState<T>): LinearCost<T[]> {
  const out: T[] = [];
  if (state.size > 0) {
    collectLeaves(state, ROOT_SLOT, 0, state.size - 1, out);
  }
  return $('O(n)', $cost(out));
}

// =============================================================================
// Range Query Tree Factory
// =============================================================================

/**
 * Factory function to create a RangeQueryTree.
 * Encapsulates the backing state and the update listeners.
 *
 * @example
 * ```typescript
 * const tree = createRangeQueryTree([1, 2, 3, 4, 5], sumMonoid);
 * tree.query(1, 3); // 9
 * tree.update(2, 10);
 * tree.query(1, 3); // 16
 * ```
 */
export function createRangeQueryTree<T>(
  sequence: readonly T[],
  monoid: Monoid<T>
): RangeQueryTree<T> {
  const state: RangeQueryTreeState<T> = buildRangeQueryTree(sequence, monoid);
  const listeners = new Set<UpdateListener<T>>();

  function notifyListeners(position: number, previous: T, value: T): void {
    const event = { position, previous, value };
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (error) {
        // Don't let one listener's error affect others
        console.error('Range query tree listener threw an error:', error);
      }
    }
  }

  function update(position: number, value: T): void {
    const previous = updatePoint(state, position, value);
    notifyListeners(position, previous, value);
  }

  function subscribe(listener: UpdateListener<T>): Unsubscribe {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  return {
    size: state.size,
    query: (l, r) => queryRange(state, l, r),
    update,
    get: (position) => getPoint(state, position),
    total: () => totalOf(state),
    toArray: () => leavesOf(state),
    subscribe,
  };
}

/**
 * Aggregate of `[l, r]` folded directly over a plain sequence, left to right.
 * O(r - l); useful as a reference when validating a tree.
 */
export function foldRange<T>(sequence: readonly T[], monoid: Monoid<T>, l: number, r: number): LinearCost<T> {
  assertRange('fold', l, r, sequence.length);
  let acc = monoid.identity;
  for (let i = l; i <= r; i++) acc = monoid.merge(acc, sequence[i]);
  return $('O(n)', $cost(acc));
}
