/**
 * Adjacency-list graph shared by the tree and cycle algorithms.
 */

import type { Graph, GraphConfig } from '../types/state.ts';
import { vertex, isValidSize, type Vertex } from '../types/branded.ts';
import { assertIndex } from '../types/errors.ts';

const DEFAULT_GRAPH_CONFIG: GraphConfig = {
  undirected: false,
};

/**
 * Create an edgeless graph over vertices `0..vertexCount - 1`.
 */
export function createGraph(vertexCount: number, config: Partial<GraphConfig> = {}): Graph {
  if (!isValidSize(vertexCount)) {
    throw new RangeError(`Vertex count must be a non-negative integer, got ${vertexCount}`);
  }
  const { undirected } = { ...DEFAULT_GRAPH_CONFIG, ...config };
  const adjacency: Vertex[][] = Array.from({ length: vertexCount }, () => []);
  return { vertexCount, undirected, adjacency };
}

/**
 * Append `u -> v`, and `v -> u` when the graph is undirected.
 * A self loop on an undirected graph is recorded twice in `u`'s list.
 * @throws OutOfRangeError if either endpoint is not a vertex
 */
export function addEdge(graph: Graph, u: number, v: number): void {
  assertIndex('addEdge', 'u', u, graph.vertexCount);
  assertIndex('addEdge', 'v', v, graph.vertexCount);
  graph.adjacency[u].push(vertex(v));
  if (graph.undirected) {
    graph.adjacency[v].push(vertex(u));
  }
}

/**
 * Build a graph from an edge list.
 *
 * @example
 * ```typescript
 * const tree = graphFromEdges(5, [[0, 1], [0, 2], [1, 3], [1, 4]], { undirected: true });
 * ```
 */
export function graphFromEdges(
  vertexCount: number,
  edges: ReadonlyArray<readonly [number, number]>,
  config: Partial<GraphConfig> = {}
): Graph {
  const graph = createGraph(vertexCount, config);
  for (const [u, v] of edges) {
    addEdge(graph, u, v);
  }
  return graph;
}

export function edgeCount(graph: Graph): number {
  const entries = graph.adjacency.reduce((sum, list) => sum + list.length, 0);
  return graph.undirected ? entries / 2 : entries;
}
