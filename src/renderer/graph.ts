import type { Connection } from '../core/types.js';

export type NodeId = string;

/**
 * Directed graph over node names. Nodes keep their order of first
 * appearance and edges their declaration order; a repeated edge is dropped.
 */
export class FlowGraph {
  private readonly order: NodeId[] = [];
  private readonly out = new Map<NodeId, Connection[]>();
  private readonly inc = new Map<NodeId, Connection[]>();
  private readonly edgeList: Connection[] = [];
  private readonly keys = new Set<string>();

  addNode(id: NodeId): NodeId {
    const name = id.trim();
    if (!name) throw new RangeError('Node identifiers must not be empty');
    if (!this.out.has(name)) {
      this.order.push(name);
      this.out.set(name, []);
      this.inc.set(name, []);
    }
    return name;
  }

  /** Returns false for an edge that was already declared. */
  addEdge(source: NodeId, target: NodeId): boolean {
    const s = this.addNode(source);
    const t = this.addNode(target);
    const key = JSON.stringify([s, t]);
    if (this.keys.has(key)) return false;
    this.keys.add(key);
    const edge: Connection = [s, t];
    this.edgeList.push(edge);
    this.out.get(s)?.push(edge);
    this.inc.get(t)?.push(edge);
    return true;
  }

  has(id: NodeId): boolean {
    return this.out.has(id);
  }

  get size(): number {
    return this.order.length;
  }

  get nodes(): readonly NodeId[] {
    return this.order;
  }

  get edges(): readonly Connection[] {
    return this.edgeList;
  }

  outEdges(id: NodeId): readonly Connection[] {
    return this.out.get(id) ?? [];
  }

  inEdges(id: NodeId): readonly Connection[] {
    return this.inc.get(id) ?? [];
  }
}

export function createGraph(connections: Iterable<Connection>, isolated: Iterable<NodeId> = []): FlowGraph {
  const g = new FlowGraph();
  for (const [s, t] of connections) g.addEdge(s, t);
  for (const id of isolated) g.addNode(id);
  return g;
}
