import dagre from 'dagre';
import type { Connection } from '../core/types.js';
import type { FlowGraph, NodeId } from './graph.js';
import type { ILayoutEngine } from './interfaces.js';
import type { LayoutNode, LayoutResult } from './types.js';

/**
 * Reads layers and orders from dagre's ranking of unit-sized nodes.
 * Self-loops are left out of the dagre graph; they are always back edges.
 */
export class DagreLayoutEngine implements ILayoutEngine {
  layout(graph: FlowGraph): LayoutResult {
    const g = new dagre.graphlib.Graph();
    g.setGraph({ rankdir: 'TB', ranksep: 1, nodesep: 1, marginx: 0, marginy: 0 });
    g.setDefaultEdgeLabel(() => ({}));

    for (const id of graph.nodes) g.setNode(id, { width: 1, height: 1 });
    for (const [s, t] of graph.edges) {
      if (s !== t) g.setEdge(s, t);
    }
    dagre.layout(g);

    const first = new Map(graph.nodes.map((id, i) => [id, i] as const));
    const placed = graph.nodes.map((id) => {
      const n = g.node(id);
      return { id, x: n.x, y: n.y };
    });
    const rows = [...new Set(placed.map((p) => p.y))].sort((a, b) => a - b);
    const layers: NodeId[][] = rows.map((y) =>
      placed
        .filter((p) => p.y === y)
        .sort((a, b) => a.x - b.x || (first.get(a.id) ?? 0) - (first.get(b.id) ?? 0))
        .map((p) => p.id)
    );

    const nodes = new Map<NodeId, LayoutNode>();
    layers.forEach((ids, layer) => ids.forEach((id, order) => nodes.set(id, { layer, order })));
    const layerOf = (id: NodeId) => nodes.get(id)?.layer ?? 0;
    const backEdges = new Set<Connection>(graph.edges.filter(([s, t]) => layerOf(t) <= layerOf(s)));
    return { nodes, layers, edges: [...graph.edges], backEdges, hasCycles: backEdges.size > 0 };
  }
}
