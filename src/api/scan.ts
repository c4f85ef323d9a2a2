/**
 * Scan namespace — O(n) and O(n log n) operations.
 * All functions in this namespace build a structure or traverse all of it.
 * Use `query.*` for lookups on an already built structure.
 */

import {
  buildRangeQueryTree,
  leavesOf,
  foldRange,
} from '../structures/range-query-tree.ts';
import { collectGroups } from '../structures/disjoint-set.ts';
import { buildLcaIndex } from '../graphs/lowest-common-ancestor.ts';
import { findCycle, hasCycle } from '../graphs/cycle-detector.ts';

export const scan = {
  /** @complexity O(n) — bottom-up build of every tree slot */
  buildRangeQueryTree,
  /** @complexity O(n) — in-order walk of all leaves */
  leavesOf,
  /** @complexity O(r - l) — direct left-to-right fold over a plain sequence */
  foldRange,
  /** @complexity O(n) — one find per element */
  collectGroups,
  /** @complexity O(n log n) — DFS plus lifting table */
  buildLcaIndex,
  /** @complexity O(V + E) — three-color DFS */
  findCycle,
  /** @complexity O(V + E) — three-color DFS */
  hasCycle,
} as const;
