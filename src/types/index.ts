/**
 * Type exports for the algorithm library.
 */

// State types
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
} from './state.ts';

// Structure interfaces
export type {
  UpdateEvent,
  UpdateListener,
  Unsubscribe,
  RangeQueryTree,
  DisjointSet,
  CycleDetector,
} from './structures.ts';

// Branded index types
export type {
  Vertex,
  NodeSlot,
} from './branded.ts';

export {
  vertex,
  isIndexWithin,
  isValidSize,
  midpoint,
} from './branded.ts';

// Cost types
export type {
  Cost,
  CostLevel,
  CostBound,
  Costed,
  ConstCost,
  LogCost,
  LinearCost,
  NLogNCost,
  Ctx,
} from './cost.ts';

export { $, $cost } from './cost.ts';

// Errors
export type { ErrorCode } from './errors.ts';
export { OutOfRangeError } from './errors.ts';
