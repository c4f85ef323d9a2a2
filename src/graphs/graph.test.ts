import { describe, it, expect } from 'vitest';
import { createGraph, addEdge, graphFromEdges, edgeCount } from './graph.ts';
import { OutOfRangeError } from '../types/errors.ts';

describe('Graph', () => {
  it('should default to a directed, edgeless graph', () => {
    const graph = createGraph(3);
    expect(graph.undirected).toBe(false);
    expect(graph.adjacency).toEqual([[], [], []]);
    expect(edgeCount(graph)).toBe(0);
  });

  it('should add a single direction for directed graphs', () => {
    const graph = createGraph(3);
    addEdge(graph, 0, 2);
    addEdge(graph, 0, 1);
    expect(graph.adjacency).toEqual([[2, 1], [], []]);
    expect(edgeCount(graph)).toBe(2);
  });

  it('should add both directions for undirected graphs', () => {
    const graph = graphFromEdges(3, [[0, 1], [1, 2]], { undirected: true });
    expect(graph.adjacency).toEqual([[1], [0, 2], [1]]);
    expect(edgeCount(graph)).toBe(2);
  });

  it('should record an undirected self loop twice', () => {
    const graph = graphFromEdges(2, [[1, 1]], { undirected: true });
    expect(graph.adjacency[1]).toEqual([1, 1]);
    expect(edgeCount(graph)).toBe(1);
  });

  it('should reject endpoints outside the graph', () => {
    const graph = createGraph(2);
    expect(() => addEdge(graph, 0, 2)).toThrow(OutOfRangeError);
    expect(() => addEdge(graph, -1, 0)).toThrow(
      'addEdge: u -1 is out of range, expected an integer in [0, 1]'
    );
    expect(graph.adjacency).toEqual([[], []]);
  });

  it('should reject invalid vertex counts', () => {
    expect(() => createGraph(-2)).toThrow(RangeError);
  });
});
