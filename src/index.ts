/**
 * Arbor - classical algorithmic primitives
 *
 * Main entry point exporting core types, structures, and utilities.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  Monoid,
  RangeQueryTreeState,
  DisjointSetState,
  Graph,
  GraphConfig,
  LcaIndex,
  LcaConfig,
  VertexColor,
  CycleDetectorConfig,
  UpdateEvent,
  UpdateListener,
  Unsubscribe,
  RangeQueryTree,
  DisjointSet,
  CycleDetector,
  ErrorCode,
} from './types/index.ts';

// Branded index types
export type { Vertex } from './types/index.ts';

export {
  vertex,
  isIndexWithin,
  isValidSize,
} from './types/index.ts';

// Cost types
export type {
  Costed,
  ConstCost,
  LogCost,
  LinearCost,
  NLogNCost,
} from './types/index.ts';

export { $, $cost } from './types/index.ts';

// =============================================================================
// Errors
// =============================================================================

export { OutOfRangeError } from './types/index.ts';

// =============================================================================
// Structures
// =============================================================================

export {
  createRangeQueryTree,
  buildRangeQueryTree,
  queryRange,
  updatePoint,
  getPoint,
  totalOf,
  leavesOf,
  foldRange,
} from './structures/range-query-tree.ts';

export {
  defineMonoid,
  sumMonoid,
  bigintSumMonoid,
  minMonoid,
  maxMonoid,
  xorMonoid,
  gcdMonoid,
  concatMonoid,
} from './structures/monoids.ts';

export {
  createDisjointSet,
  createDisjointSetState,
  findSet,
  unionSets,
  setSizeOf,
  collectGroups,
} from './structures/disjoint-set.ts';

// =============================================================================
// Graphs
// =============================================================================

export {
  createGraph,
  addEdge,
  graphFromEdges,
  edgeCount,
} from './graphs/graph.ts';

export {
  buildLcaIndex,
  lowestCommonAncestor,
  depthOf,
  kthAncestor,
  distance,
} from './graphs/lowest-common-ancestor.ts';

export {
  createCycleDetector,
  findCycle,
  hasCycle,
} from './graphs/cycle-detector.ts';

// =============================================================================
// Complexity-stratified API
// =============================================================================

export { query, scan } from './api/index.ts';
