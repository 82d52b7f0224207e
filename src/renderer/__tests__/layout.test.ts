/**
 * Layer assignment tests
 *
 * - Back-edge detection and cycle handling
 * - Longest-path layers
 * - Barycenter ordering
 * - Dagre-backed engine
 */

import { describe, it, expect } from 'vitest';
import { LayeredLayoutEngine, computeLayout, findBackEdges } from '../layout.js';
import { DagreLayoutEngine } from '../dagre-layout.js';
import { FlowGraph, createGraph } from '../graph.js';
import type { Connection } from '../../core/types.js';

describe('FlowGraph', () => {
  it('keeps first-appearance order and drops repeated edges', () => {
    const g = new FlowGraph();
    expect(g.addEdge('B', 'A')).toBe(true);
    expect(g.addEdge(' B ', 'A')).toBe(false);
    g.addEdge('A', 'C');
    expect(g.nodes).toEqual(['B', 'A', 'C']);
    expect(g.edges).toEqual([['B', 'A'], ['A', 'C']]);
    expect(g.outEdges('A')).toEqual([['A', 'C']]);
    expect(g.inEdges('A')).toEqual([['B', 'A']]);
  });

  it('rejects empty node names', () => {
    expect(() => new FlowGraph().addNode('  ')).toThrow(RangeError);
  });

  it('adds isolated nodes', () => {
    const g = createGraph([], ['Solo']);
    expect(g.size).toBe(1);
    expect(g.has('Solo')).toBe(true);
  });
});

describe('LayeredLayoutEngine', () => {
  it('puts a chain on one layer per node', () => {
    const layout = computeLayout([['A', 'B'], ['B', 'C'], ['C', 'D']]);
    expect(layout.layers).toEqual([['A'], ['B'], ['C'], ['D']]);
    expect(layout.hasCycles).toBe(false);
    expect(layout.backEdges.size).toBe(0);
    expect(layout.nodes.get('C')).toEqual({ layer: 2, order: 0 });
  });

  it('breaks a cycle at the edge that closes it', () => {
    const layout = computeLayout([['A', 'B'], ['B', 'C'], ['C', 'A']]);
    expect([...layout.backEdges]).toEqual([['C', 'A']]);
    expect(layout.layers).toEqual([['A'], ['B'], ['C']]);
    expect(layout.hasCycles).toBe(true);
  });

  it('returns back edges as the same tuples as the edge list', () => {
    const layout = computeLayout([['A', 'B'], ['B', 'A']]);
    const [back] = layout.backEdges;
    expect(layout.edges).toContain(back);
    expect(layout.edges.indexOf(back)).toBe(1);
  });

  it('starts rootless components at their lexicographically first node', () => {
    const layout = computeLayout([['Z', 'Y'], ['Y', 'Z']]);
    expect([...layout.backEdges]).toEqual([['Z', 'Y']]);
    expect(layout.layers).toEqual([['Y'], ['Z']]);
  });

  it('handles a self-loop', () => {
    const layout = computeLayout([['A', 'A']]);
    expect(layout.layers).toEqual([['A']]);
    expect(layout.hasCycles).toBe(true);
  });

  it('lays out a diamond on three layers', () => {
    const layout = computeLayout([['A', 'B'], ['A', 'C'], ['B', 'D'], ['C', 'D']]);
    expect(layout.layers).toEqual([['A'], ['B', 'C'], ['D']]);
  });

  it('places a node below its longest predecessor path', () => {
    const layout = computeLayout([['A', 'B'], ['B', 'C'], ['A', 'C']]);
    expect(layout.nodes.get('C')?.layer).toBe(2);
  });

  it('places disconnected components side by side', () => {
    const layout = computeLayout([['A', 'B'], ['C', 'D']]);
    expect(layout.layers).toEqual([['A', 'C'], ['B', 'D']]);
  });

  it('reorders a layer to remove a crossing', () => {
    const edges: Connection[] = [['R', 'A'], ['R', 'B'], ['B', 'X'], ['A', 'Y']];
    expect(computeLayout(edges, { sweeps: 0 }).layers[2]).toEqual(['X', 'Y']);
    expect(computeLayout(edges).layers[2]).toEqual(['Y', 'X']);
  });

  it('keeps layer sizes when nodes are renamed', () => {
    const edges: Connection[] = [['a', 'b'], ['a', 'c'], ['c', 'd'], ['d', 'a'], ['b', 'e']];
    const renamed = edges.map(([s, t]): Connection => [`node ${s.toUpperCase()}`, `node ${t.toUpperCase()}`]);
    const sizes = (c: Connection[]) => computeLayout(c).layers.map((l) => l.length);
    expect(sizes(renamed)).toEqual(sizes(edges));
  });

  it('leaves an acyclic graph once back edges are removed', () => {
    const edges: Connection[] = [['A', 'B'], ['B', 'C'], ['C', 'A'], ['C', 'D'], ['D', 'B'], ['D', 'D']];
    const g = createGraph(edges);
    const back = findBackEdges(g);
    const rest = createGraph(g.edges.filter((e) => !back.has(e)));
    expect(findBackEdges(rest).size).toBe(0);
  });

  it('lays out an empty graph', () => {
    const layout = new LayeredLayoutEngine().layout(new FlowGraph());
    expect(layout.layers).toEqual([]);
    expect(layout.edges).toEqual([]);
  });
});

describe('DagreLayoutEngine', () => {
  const engine = new DagreLayoutEngine();

  it('ranks a chain', () => {
    const layout = engine.layout(createGraph([['A', 'B'], ['B', 'C']]));
    expect(layout.layers).toEqual([['A'], ['B'], ['C']]);
    expect(layout.hasCycles).toBe(false);
  });

  it('ranks a diamond', () => {
    const layout = engine.layout(createGraph([['A', 'B'], ['A', 'C'], ['B', 'D'], ['C', 'D']]));
    expect(layout.layers.map((l) => l.length)).toEqual([1, 2, 1]);
    expect(layout.layers[0]).toEqual(['A']);
    expect(layout.layers[2]).toEqual(['D']);
  });

  it('reports cycles as back edges', () => {
    const layout = engine.layout(createGraph([['A', 'B'], ['B', 'C'], ['C', 'A']]));
    expect(layout.hasCycles).toBe(true);
    expect(layout.backEdges.size).toBe(1);
    expect(layout.nodes.size).toBe(3);
  });

  it('treats self-loops as back edges', () => {
    const layout = engine.layout(createGraph([['A', 'A'], ['A', 'B']]));
    expect(layout.layers).toEqual([['A'], ['B']]);
    expect([...layout.backEdges]).toEqual([['A', 'A']]);
  });
});
