/**
 * Disjoint-set union (union-find) with union by size and path compression.
 * Amortized O(α(n)) per operation.
 */

import type { DisjointSetState } from '../types/state.ts';
import type { DisjointSet } from '../types/structures.ts';
import { $, $cost, type LinearCost } from '../types/cost.ts';
import { isValidSize } from '../types/branded.ts';
import { assertIndex } from '../types/errors.ts';

// =============================================================================
// Pure Operations
// =============================================================================

export function createDisjointSetState(size: number): DisjointSetState {
  if (!isValidSize(size)) {
    throw new RangeError(`Disjoint set size must be a non-negative integer, got ${size}`);
  }
  const parent = new Int32Array(size);
  for (let i = 0; i < size; i++) parent[i] = i;
  return { parent, setSize: new Int32Array(size).fill(1), count: size };
}

/**
 * Representative of the set containing `x`.
 * Every vertex on the path is re-pointed straight at the root.
 */
export function findSet(state: DisjointSetState, x: number): number {
  assertIndex('find', 'x', x, state.parent.length);
  const { parent } = state;

  let root = x;
  while (parent[root] !== root) root = parent[root];

  let current = x;
  while (parent[current] !== root) {
    const next = parent[current];
    parent[current] = root;
    current = next;
  }
  return root;
}

/**
 * Merge the sets containing `a` and `b`; the smaller set goes under the
 * larger one's root, and on a tie `a`'s root stays root.
 * @returns true if two distinct sets were merged
 */
export function unionSets(state: DisjointSetState, a: number, b: number): boolean {
  let rootA = findSet(state, a);
  let rootB = findSet(state, b);
  if (rootA === rootB) return false;

  const { parent, setSize } = state;
  if (setSize[rootA] < setSize[rootB]) {
    [rootA, rootB] = [rootB, rootA];
  }
  parent[rootB] = rootA;
  setSize[rootA] += setSize[rootB];
  state.count -= 1;
  return true;
}

export function setSizeOf(state: DisjointSetState, x: number): number {
  return state.setSize[findSet(state, x)];
}

/**
 * Members of every set. Each group is ascending and groups are ordered by
 * their smallest member.
 */
export function collectGroups(state: DisjointSetState): LinearCost<number[][]> {
  const byRoot = new Map<number, number[]>();
  for (let element = 0; element < state.parent.length; element++) {
    const root = findSet(state, element);
    const group = byRoot.get(root);
    if (group) group.push(element);
    else byRoot.set(root, [element]);
  }
  return $('O(n)', $cost([...byRoot.values()]));
}

// =============================================================================
// Disjoint Set Factory
// =============================================================================

/**
 * Factory function to create a DisjointSet over elements `0..size - 1`,
 * each starting in its own set.
 *
 * @example
 * ```typescript
 * const dsu = createDisjointSet(5);
 * dsu.union(0, 1);
 * dsu.union(2, 3);
 * dsu.union(0, 2);
 * dsu.connected(1, 3); // true
 * dsu.sizeOf(3);       // 4
 * ```
 */
export function createDisjointSet(size: number): DisjointSet {
  const state = createDisjointSetState(size);

  return {
    size,
    get count() {
      return state.count;
    },
    find: (x) => findSet(state, x),
    union: (a, b) => unionSets(state, a, b),
    connected: (a, b) => findSet(state, a) === findSet(state, b),
    sizeOf: (x) => setSizeOf(state, x),
    groups: () => collectGroups(state),
  };
}
