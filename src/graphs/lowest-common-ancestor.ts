/**
 * Lowest common ancestor by binary lifting.
 *
 * Preprocessing walks the tree once from the root and fills `up[k][v]`, the
 * 2^k-th ancestor of `v`, in O(n log n). Each query then climbs in O(log n).
 *
 * Cost typing: every result leaves through a `$(bound, $cost(value))`
 * boundary (see `src/types/cost.ts`).
 */

import type { Graph, LcaConfig, LcaIndex } from '../types/state.ts';
import { $, $cost, type ConstCost, type LogCost, type NLogNCost } from '../types/cost.ts';
import { vertex, isIndexWithin, type Vertex } from '../types/branded.ts';
import { OutOfRangeError, assertIndex } from '../types/errors.ts';

const DEFAULT_LCA_CONFIG: LcaConfig = {
  root: 0,
};

/**
 * Smallest `levels >= 1` with `2^levels >= vertexCount`, so that any depth
 * below `vertexCount` can be climbed with jumps `2^0 .. 2^(levels - 1)`.
 */
function levelsFor(vertexCount: number): number {
  let levels = 1;
  while ((1 << levels) < vertexCount) levels++;
  return levels;
}

// =============================================================================
// Preprocessing
// =============================================================================

/**
 * Build the lifting table of the tree rooted at `config.root`.
 *
 * Uses an explicit stack, so deep trees do not exhaust the call stack.
 * Edges leading back to an already visited vertex are ignored; vertices the
 * root cannot reach keep depth -1 and are rejected by every query.
 *
 * @throws Error if the graph is directed
 * @throws RangeError if the root is not a vertex of the graph
 */
export function buildLcaIndex(graph: Graph, config: Partial<LcaConfig> = {}): NLogNCost<LcaIndex> {
  const { root } = { ...DEFAULT_LCA_CONFIG, ...config };
  if (!graph.undirected) {
    throw new Error('Lowest common ancestor requires an undirected tree graph');
  }
  const { vertexCount } = graph;
  if (!isIndexWithin(root, vertexCount)) {
    throw new RangeError(`Root ${root} is not a vertex of a graph with ${vertexCount} vertices`);
  }

  const levels = levelsFor(vertexCount);
  const depth = new Int32Array(vertexCount).fill(-1);
  const up: Int32Array[] = [];
  for (let k = 0; k < levels; k++) {
    const row = new Int32Array(vertexCount);
    for (let v = 0; v < vertexCount; v++) row[v] = v;
    up.push(row);
  }

  depth[root] = 0;
  const stack: number[] = [root];
  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    // Ancestors are always finished before their descendants are popped
    for (let k = 1; k < levels; k++) {
      up[k][node] = up[k - 1][up[k - 1][node]];
    }
    const neighbors = graph.adjacency[node];
    for (let i = neighbors.length - 1; i >= 0; i--) {
      const child = neighbors[i];
      if (depth[child] !== -1) continue;
      depth[child] = depth[node] + 1;
      up[0][child] = node;
      stack.push(child);
    }
  }

  return $('O(n log n)', $cost<LcaIndex>({
    root: vertex(root),
    vertexCount,
    levels,
    depth,
    up,
  }));
}

// =============================================================================
// Queries
// =============================================================================

function assertReachable(index: LcaIndex, operation: string, name: string, v: number): void {
  assertIndex(operation, name, v, index.vertexCount);
  if (index.depth[v] < 0) {
    throw new OutOfRangeError(
      operation,
      index.vertexCount,
      `${name} ${v} is not reachable from root ${index.root}`
    );
  }
}

function lift(index: LcaIndex, v: number, steps: number): number {
  let current = v;
  for (let k = 0; k < index.levels; k++) {
    if ((steps >> k) & 1) current = index.up[k][current];
  }
  return current;
}

/**
 * Depth of `v` below the root (the root has depth 0).
 * @throws OutOfRangeError if `v` is not a vertex reachable from the root
 */
export function depthOf(index: LcaIndex, v: number): ConstCost<number> {
  assertReachable(index, 'depthOf', 'v', v);
  return $('O(1)', $cost(index.depth[v]));
}

/**
 * Ancestor `k` levels above `v`; `kthAncestor(index, v, 0)` is `v` itself.
 * @returns null if `k` exceeds the depth of `v`
 * @throws OutOfRangeError if `v` is not reachable or `k` is not a non-negative integer
 */
export function kthAncestor(index: LcaIndex, v: number, k: number): LogCost<Vertex> | null {
  assertReachable(index, 'kthAncestor', 'v', v);
  if (!Number.isInteger(k) || k < 0) {
    throw new OutOfRangeError('kthAncestor', index.vertexCount, `k ${k} must be a non-negative integer`);
  }
  if (k > index.depth[v]) return null;
  return $('O(log n)', $cost(vertex(lift(index, v, k))));
}

/**
 * Deepest vertex that is an ancestor of both `u` and `v`.
 * A vertex counts as its own ancestor.
 * @throws OutOfRangeError if either vertex is not reachable from the root
 */
export function lowestCommonAncestor(index: LcaIndex, u: number, v: number): LogCost<Vertex> {
  assertReachable(index, 'lca', 'u', u);
  assertReachable(index, 'lca', 'v', v);
  const { depth, up, levels } = index;

  let a = u;
  let b = v;
  if (depth[a] < depth[b]) [a, b] = [b, a];

  a = lift(index, a, depth[a] - depth[b]);
  if (a === b) return $('O(log n)', $cost(vertex(a)));

  for (let k = levels - 1; k >= 0; k--) {
    if (up[k][a] !== up[k][b]) {
      a = up[k][a];
      b = up[k][b];
    }
  }
  return $('O(log n)', $cost(vertex(up[0][a])));
}

/**
 * Number of edges on the tree path between `u` and `v`.
 */
export function distance(index: LcaIndex, u: number, v: number): LogCost<number> {
  const ancestor = lowestCommonAncestor(index, u, v);
  const { depth } = index;
  return $('O(log n)', $cost(depth[u] + depth[v] - 2 * depth[ancestor]));
}
