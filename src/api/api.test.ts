/**
 * Tests for the complexity-stratified namespaces.
 */

import { describe, it, expect } from 'vitest';
import { query, scan } from './index.ts';
import { sumMonoid } from '../structures/monoids.ts';
import { createDisjointSetState } from '../structures/disjoint-set.ts';
import { graphFromEdges } from '../graphs/graph.ts';

describe('API namespaces', () => {
  it('should build with scan and read with query', () => {
    const state = scan.buildRangeQueryTree([1, 2, 3, 4, 5], sumMonoid);
    expect(query.queryRange(state, 1, 3)).toBe(9);
    expect(query.updatePoint(state, 2, 10)).toBe(3);
    expect(query.getPoint(state, 2)).toBe(10);
    expect(query.totalOf(state)).toBe(22);
    expect(scan.leavesOf(state)).toEqual([1, 2, 10, 4, 5]);
    expect(scan.foldRange([1, 2, 10, 4, 5], sumMonoid, 1, 3)).toBe(16);
  });

  it('should expose disjoint-set operations', () => {
    const state = createDisjointSetState(3);
    expect(query.unionSets(state, 0, 1)).toBe(true);
    expect(query.findSet(state, 1)).toBe(0);
    expect(query.setSizeOf(state, 1)).toBe(2);
    expect(scan.collectGroups(state)).toEqual([[0, 1], [2]]);
  });

  it('should expose tree and cycle algorithms', () => {
    const tree = graphFromEdges(4, [[0, 1], [1, 2], [1, 3]], { undirected: true });
    const index = scan.buildLcaIndex(tree);
    expect(query.lowestCommonAncestor(index, 2, 3)).toBe(1);
    expect(query.depthOf(index, 3)).toBe(2);
    expect(query.kthAncestor(index, 3, 2)).toBe(0);
    expect(query.distance(index, 2, 3)).toBe(2);
    expect(scan.findCycle(tree)).toEqual([]);
    expect(scan.hasCycle(graphFromEdges(2, [[0, 1], [1, 0]]))).toBe(true);
  });
});
