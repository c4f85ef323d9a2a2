/**
 * Query namespace — O(1), O(log n) and near-constant operations.
 * Functions here read from, or point-update, already built structures.
 */

import {
  queryRange,
  updatePoint,
  getPoint,
  totalOf,
} from '../structures/range-query-tree.ts';
import {
  findSet,
  unionSets,
  setSizeOf,
} from '../structures/disjoint-set.ts';
import {
  lowestCommonAncestor,
  depthOf,
  kthAncestor,
  distance,
} from '../graphs/lowest-common-ancestor.ts';

export const query = {
  /** @complexity O(log n) — range decomposition over the implicit tree */
  queryRange,
  /** @complexity O(log n) — root-to-leaf descent, ancestors recomputed on unwind */
  updatePoint,
  /** @complexity O(log n) — root-to-leaf descent */
  getPoint,
  /** @complexity O(1) — root slot */
  totalOf,
  /** @complexity O(α(n)) amortized — path compression */
  findSet,
  /** @complexity O(α(n)) amortized — union by size */
  unionSets,
  /** @complexity O(α(n)) amortized — find plus cached set size */
  setSizeOf,
  /** @complexity O(log n) — binary lifting */
  lowestCommonAncestor,
  /** @complexity O(1) — precomputed depth */
  depthOf,
  /** @complexity O(log n) — one jump per set bit of k */
  kthAncestor,
  /** @complexity O(log n) — one LCA lookup */
  distance,
} as const;
