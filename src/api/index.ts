/**
 * Complexity-stratified API namespaces.
 *
 * - `query.*` — O(log n), O(1) and amortized near-constant operations
 * - `scan.*` — O(n) and above (builds and full traversals)
 */

export { query } from './query.ts';
export { scan } from './scan.ts';
