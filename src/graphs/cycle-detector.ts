/**
 * Cycle detection with a three-color depth-first search.
 * Works on directed and undirected graphs in O(V + E).
 */

import type { CycleDetectorConfig, Graph, VertexColor } from '../types/state.ts';
import type { CycleDetector } from '../types/structures.ts';
import { $, $cost, type LinearCost } from '../types/cost.ts';
import { vertex, type Vertex } from '../types/branded.ts';
import { addEdge, createGraph } from './graph.ts';

const NO_PARENT = -1;

/**
 * A DFS frame: the vertex, its DFS parent, and the next neighbor to visit.
 */
interface Frame {
  readonly v: number;
  readonly parent: number;
  next: number;
}

interface BackEdge {
  readonly start: number;
  readonly end: number;
}

/**
 * Walk from `start` until the first edge into a gray vertex.
 * In an undirected graph every edge back to the DFS parent is skipped, so
 * the two directions of one edge never count as a cycle.
 */
function searchFrom(
  graph: Graph,
  start: number,
  color: VertexColor[],
  parent: Int32Array
): BackEdge | null {
  color[start] = 'gray';
  parent[start] = NO_PARENT;
  const stack: Frame[] = [{ v: start, parent: NO_PARENT, next: 0 }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const neighbors = graph.adjacency[frame.v];

    if (frame.next === neighbors.length) {
      color[frame.v] = 'black';
      stack.pop();
      continue;
    }

    const u = neighbors[frame.next];
    frame.next += 1;
    if (graph.undirected && u === frame.parent) continue;

    if (color[u] === 'white') {
      color[u] = 'gray';
      parent[u] = frame.v;
      stack.push({ v: u, parent: frame.v, next: 0 });
    } else if (color[u] === 'gray') {
      return { start: u, end: frame.v };
    }
  }
  return null;
}

/**
 * Find one cycle as a closed walk `[s, ..., s]`.
 *
 * Vertices are tried as DFS roots in ascending order and neighbors are
 * visited in insertion order; the first edge into a vertex still on the
 * DFS stack closes the cycle. A self loop on `u` yields `[u, u]`.
 *
 * @returns the cycle, or an empty array if the graph is acyclic
 */
export function findCycle(graph: Graph): LinearCost<Vertex[]> {
  const color: VertexColor[] = new Array<VertexColor>(graph.vertexCount).fill('white');
  const parent = new Int32Array(graph.vertexCount).fill(NO_PARENT);

  let backEdge: BackEdge | null = null;
  for (let v = 0; v < graph.vertexCount && backEdge === null; v++) {
    if (color[v] === 'white') {
      backEdge = searchFrom(graph, v, color, parent);
    }
  }

  if (backEdge === null) return $('O(n)', $cost<Vertex[]>([]));

  const cycle: Vertex[] = [vertex(backEdge.start)];
  for (let v = backEdge.end; v !== backEdge.start; v = parent[v]) {
    cycle.push(vertex(v));
  }
  cycle.push(vertex(backEdge.start));
  cycle.reverse();

  return $('O(n)', $cost(cycle));
}

/**
 * Whether the graph contains any cycle.
 */
export function hasCycle(graph: Graph): LinearCost<boolean> {
  return $('O(n)', $cost(findCycle(graph).length > 0));
}

// =============================================================================
// Cycle Detector Factory
// =============================================================================

/**
 * Factory function to create a CycleDetector over `vertexCount` vertices.
 *
 * @example
 * ```typescript
 * const detector = createCycleDetector(3);
 * detector.addEdge(0, 1);
 * detector.addEdge(1, 2);
 * detector.addEdge(2, 0);
 * detector.findCycle(); // [0, 1, 2, 0]
 * ```
 */
export function createCycleDetector(
  vertexCount: number,
  config: Partial<CycleDetectorConfig> = {}
): CycleDetector {
  const graph = createGraph(vertexCount, config);

  return {
    graph,
    addEdge: (u, v) => addEdge(graph, u, v),
    findCycle: () => findCycle(graph),
  };
}
