import type { Connection } from '../core/types.js';
import { createGraph, type FlowGraph, type NodeId } from './graph.js';
import type { ILayoutEngine } from './interfaces.js';
import type { LayoutNode, LayoutResult } from './types.js';

export interface LayeredLayoutOptions {
  /** Barycenter sweeps; each is one down pass and one up pass. */
  sweeps?: number;
}

const ON_STACK = 1;
const DONE = 2;

/**
 * Sugiyama-style layering: DFS back-edge classification, longest-path
 * layers on the remaining DAG, then barycenter ordering within layers.
 */
export class LayeredLayoutEngine implements ILayoutEngine {
  private readonly sweeps: number;

  constructor(options: LayeredLayoutOptions = {}) {
    this.sweeps = Math.max(0, Math.floor(options.sweeps ?? 4));
  }

  layout(graph: FlowGraph): LayoutResult {
    const backEdges = findBackEdges(graph);
    const layerOf = assignLayers(graph, backEdges);

    const layerCount = graph.size === 0 ? 0 : Math.max(...layerOf.values()) + 1;
    const layers: NodeId[][] = Array.from({ length: layerCount }, () => []);
    for (const id of graph.nodes) layers[layerOf.get(id) ?? 0].push(id);

    for (let s = 0; s < this.sweeps; s++) {
      for (let l = 1; l < layers.length; l++) {
        layers[l] = reorder(layers[l], layers[l - 1], (id) =>
          graph.inEdges(id).filter((e) => !backEdges.has(e)).map((e) => e[0])
        );
      }
      for (let l = layers.length - 2; l >= 0; l--) {
        layers[l] = reorder(layers[l], layers[l + 1], (id) =>
          graph.outEdges(id).filter((e) => !backEdges.has(e)).map((e) => e[1])
        );
      }
    }

    const nodes = new Map<NodeId, LayoutNode>();
    layers.forEach((ids, layer) => ids.forEach((id, order) => nodes.set(id, { layer, order })));
    return {
      nodes,
      layers,
      edges: [...graph.edges],
      backEdges,
      hasCycles: backEdges.size > 0,
    };
  }
}

/** Edges whose target is on the DFS stack when they are explored. */
export function findBackEdges(graph: FlowGraph): Set<Connection> {
  const state = new Map<NodeId, number>();
  const back = new Set<Connection>();

  const visit = (root: NodeId) => {
    const stack: Array<{ id: NodeId; next: number }> = [{ id: root, next: 0 }];
    state.set(root, ON_STACK);
    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const out = graph.outEdges(frame.id);
      if (frame.next >= out.length) {
        state.set(frame.id, DONE);
        stack.pop();
        continue;
      }
      const edge = out[frame.next++];
      const seen = state.get(edge[1]);
      if (seen === ON_STACK) back.add(edge);
      else if (seen === undefined) {
        state.set(edge[1], ON_STACK);
        stack.push({ id: edge[1], next: 0 });
      }
    }
  };

  for (const id of graph.nodes) {
    if (graph.inEdges(id).length === 0 && !state.has(id)) visit(id);
  }
  // Components without a root start from their lexicographically first node.
  for (const id of [...graph.nodes].sort()) {
    if (!state.has(id)) visit(id);
  }
  return back;
}

function assignLayers(graph: FlowGraph, backEdges: Set<Connection>): Map<NodeId, number> {
  const indeg = new Map<NodeId, number>();
  for (const id of graph.nodes) indeg.set(id, 0);
  for (const e of graph.edges) {
    if (!backEdges.has(e)) indeg.set(e[1], (indeg.get(e[1]) ?? 0) + 1);
  }
  const layer = new Map<NodeId, number>();
  const queue = graph.nodes.filter((id) => indeg.get(id) === 0);
  for (const id of queue) layer.set(id, 0);
  for (let i = 0; i < queue.length; i++) {
    const id = queue[i];
    const base = (layer.get(id) ?? 0) + 1;
    for (const e of graph.outEdges(id)) {
      if (backEdges.has(e)) continue;
      const t = e[1];
      layer.set(t, Math.max(layer.get(t) ?? 0, base));
      const left = (indeg.get(t) ?? 0) - 1;
      indeg.set(t, left);
      if (left === 0) queue.push(t);
    }
  }
  return layer;
}

function reorder(layer: NodeId[], reference: NodeId[], neighbours: (id: NodeId) => NodeId[]): NodeId[] {
  const pos = new Map(reference.map((id, i) => [id, i] as const));
  return layer
    .map((id, index) => {
      const ps = neighbours(id).flatMap((n) => {
        const p = pos.get(n);
        return p === undefined ? [] : [p];
      });
      const value = ps.length > 0 ? ps.reduce((a, b) => a + b, 0) / ps.length : index;
      return { id, value };
    })
    .sort((a, b) => a.value - b.value)
    .map((e) => e.id);
}

export function computeLayout(
  connections: Iterable<Connection>,
  options: LayeredLayoutOptions = {}
): LayoutResult {
  return new LayeredLayoutEngine(options).layout(createGraph(connections));
}
