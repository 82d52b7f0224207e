import type { Connection } from '../core/types.js';
import type { Direction } from '../core/options.js';
import type { NodeId } from './graph.js';

export type { NodeId } from './graph.js';

export interface LayoutNode {
  layer: number;
  order: number;
}

export interface LayoutResult {
  nodes: Map<NodeId, LayoutNode>;
  /** Node ids per layer, in their final order. */
  layers: NodeId[][];
  /** Deduplicated edges in declaration order. */
  edges: Connection[];
  /** Subset of `edges` (same tuple objects) that close a cycle. */
  backEdges: Set<Connection>;
  hasCycles: boolean;
}

export interface BoxDimensions {
  width: number;
  height: number;
  lines: string[];
}

export interface Point {
  x: number;
  y: number;
}

export interface Positions {
  /** Top-left corner of every box. */
  nodes: Map<NodeId, Point>;
  /** Exit cell on the source's trailing border, per edge. */
  exitPorts: Map<Connection, Point>;
  /** Entry cell on the target's leading border, per edge. */
  entryPorts: Map<Connection, Point>;
  /** Leading main-axis coordinate of each layer, relative to the diagram origin. */
  layerStarts: number[];
  /** Main-axis extent of each layer, shadows included. */
  layerBands: number[];
  /** Corridor lane per back edge, 0 being the outermost. */
  lanes: Map<Connection, number>;
  corridor: number;
  /**
   * Main-axis size of the gap before each layer; the extra last entry is the
   * gap after the final layer. The outer gaps are 0 unless a back edge uses them.
   */
  gaps: number[];
  /** Cross-axis coordinate where the boxes begin, relative to the origin. */
  crossStart: number;
  origin: Point;
  width: number;
  height: number;
}

/** Room the routes need, measured before the main axis is laid out. */
export interface RoutingDemand {
  /** Horizontal tracks wanted in each gap, indexed like `Positions.gaps`. */
  tracks: number[];
  /** Cross-axis extent that keeps every detour channel on the canvas. */
  crossExtent: number;
}

export interface EdgeRoute {
  edge: Connection;
  kind: 'forward' | 'back';
  /** Canvas cells: the exit border cell first, the arrowhead cell last. */
  points: Point[];
  lane?: number;
}

export interface RenderedDiagram {
  rows: string[];
  layout: LayoutResult;
  positions: Positions;
  dimensions: Map<NodeId, BoxDimensions>;
  direction: Direction;
  title?: string;
}
