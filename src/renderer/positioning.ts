import type { Connection } from '../core/types.js';
import type { Direction, GeneratorOptions } from '../core/options.js';
import type { NodeId } from './graph.js';
import type { BoxDimensions, LayoutResult, Point, Positions, RoutingDemand } from './types.js';

export type PositionOptions = Pick<GeneratorOptions, 'direction' | 'shadow' | 'horizontalSpacing' | 'verticalSpacing'>;

/**
 * Maps (main, cross) coordinates onto the canvas. The main axis runs along
 * the layers: y for TB, x for LR.
 */
export class Axes {
  constructor(readonly direction: Direction, readonly origin: Point = { x: 0, y: 0 }) {}

  point(main: number, cross: number): Point {
    return this.direction === 'TB'
      ? { x: this.origin.x + cross, y: this.origin.y + main }
      : { x: this.origin.x + main, y: this.origin.y + cross };
  }

  main(p: Point): number {
    return this.direction === 'TB' ? p.y - this.origin.y : p.x - this.origin.x;
  }

  cross(p: Point): number {
    return this.direction === 'TB' ? p.x - this.origin.x : p.y - this.origin.y;
  }

  /** Box extent along the main axis. */
  mainSize(d: Pick<BoxDimensions, 'width' | 'height'>): number {
    return this.direction === 'TB' ? d.height : d.width;
  }

  crossSize(d: Pick<BoxDimensions, 'width' | 'height'>): number {
    return this.direction === 'TB' ? d.width : d.height;
  }

  /** Size of the canvas for a diagram of the given extents. */
  size(mainExtent: number, crossExtent: number): { width: number; height: number } {
    return this.direction === 'TB'
      ? { width: crossExtent, height: mainExtent }
      : { width: mainExtent, height: crossExtent };
  }
}

/** Offset of port `i` of `n` along a TB box's bottom or top border. */
export function portOffsetTB(i: number, n: number, width: number): number {
  if (n <= 1) return Math.floor(width / 2);
  const s = Math.max(1, Math.floor((width - 4) / (n + 1)));
  return Math.min(2 + s * (i + 1), width - 2);
}

/** Offset of port `i` of `n` along an LR box's right or left border, within the content rows. */
export function portOffsetLR(i: number, n: number, height: number): number {
  const rows = Math.max(1, height - 2);
  if (n <= 1 || rows === 1) return 1 + Math.floor(rows / 2);
  const s = Math.max(1, Math.floor(rows / (n + 1)));
  return Math.min(1 + s * (i + 1), rows);
}

/** Lane per back edge: the largest span is outermost (lane 0); ties keep declaration order. */
export function assignLanes(layout: LayoutResult): Map<Connection, number> {
  const layerOf = (id: NodeId) => layout.nodes.get(id)?.layer ?? 0;
  const back = layout.edges.filter((e) => layout.backEdges.has(e));
  const ranked = back
    .map((edge, index) => ({ edge, index, span: layerOf(edge[0]) - layerOf(edge[1]) }))
    .sort((a, b) => b.span - a.span || a.index - b.index);
  return new Map(ranked.map((r, lane) => [r.edge, lane] as const));
}

/**
 * Main-axis size of gap `g` for a diagram of `layerCount` layers. A gap with
 * tracks keeps one clear row on each side of them; the outer gaps vanish
 * when nothing runs through them.
 */
export function gapSize(g: number, tracks: number, gap: number, layerCount: number): number {
  if (tracks > 0) return Math.max(gap, tracks + 2);
  return g > 0 && g < layerCount ? gap : 0;
}

export class PositionCalculator {
  /**
   * Places boxes and ports. `demand` comes from EdgeRouter.demand() on a first
   * pass; without it every inner gap keeps the configured spacing.
   */
  calculate(
    layout: LayoutResult,
    dimensions: Map<NodeId, BoxDimensions>,
    options: PositionOptions,
    origin: Point = { x: 0, y: 0 },
    demand?: RoutingDemand
  ): Positions {
    const axes = new Axes(options.direction, origin);
    const TB = options.direction === 'TB';
    const gap = TB ? options.verticalSpacing : options.horizontalSpacing;
    const crossGap = TB ? options.horizontalSpacing : options.verticalSpacing;
    const shade = options.shadow ? 1 : 0;
    const dimsOf = (id: NodeId): BoxDimensions => {
      const d = dimensions.get(id);
      if (!d) throw new Error(`Missing box dimensions for node '${id}'`);
      return d;
    };
    const layerOf = (id: NodeId) => layout.nodes.get(id)?.layer ?? 0;

    const lanes = assignLanes(layout);
    const corridor = lanes.size > 0 ? 2 * lanes.size + 1 : 0;
    const layerCount = layout.layers.length;

    const back = [...lanes.keys()];
    const outerTracks = (g: number) =>
      g === 0
        ? back.filter((e) => layerOf(e[1]) === 0).length
        : g === layerCount
          ? back.filter((e) => layerOf(e[0]) === layerCount - 1).length
          : 0;
    const gaps = Array.from({ length: layerCount + 1 }, (_, g) =>
      gapSize(g, demand?.tracks[g] ?? outerTracks(g), gap, layerCount)
    );

    const layerBands = layout.layers.map((ids) =>
      Math.max(0, ...ids.map((id) => axes.mainSize(dimsOf(id)) + shade))
    );
    const layerStarts: number[] = [];
    let cursor = gaps[0];
    layerBands.forEach((band, l) => {
      layerStarts.push(cursor);
      cursor += band + gaps[l + 1];
    });

    const layerWidths = layout.layers.map((ids) =>
      ids.reduce((sum, id, i) => sum + axes.crossSize(dimsOf(id)) + shade + (i > 0 ? crossGap : 0), 0)
    );
    const widest = Math.max(0, ...layerWidths);

    const nodes = new Map<NodeId, Point>();
    const crossOf = new Map<NodeId, number>();
    layout.layers.forEach((ids, l) => {
      let c = corridor + Math.floor((widest - layerWidths[l]) / 2);
      for (const id of ids) {
        crossOf.set(id, c);
        nodes.set(id, axes.point(layerStarts[l], c));
        c += axes.crossSize(dimsOf(id)) + shade + crossGap;
      }
    });

    // Slots nearest the corridor go to back edges, inner lanes first, so
    // nested lanes turn off without crossing. Forward slots follow the
    // position of the box at the other end.
    const declared = new Map(layout.edges.map((e, i) => [e, i] as const));
    const centre = (id: NodeId) => (crossOf.get(id) ?? 0) + axes.crossSize(dimsOf(id)) / 2;
    const bySlot = (far: (e: Connection) => NodeId) => (a: Connection, b: Connection) => {
      const laneA = lanes.get(a);
      const laneB = lanes.get(b);
      if (laneA !== undefined && laneB !== undefined) return laneB - laneA;
      if (laneA !== undefined) return -1;
      if (laneB !== undefined) return 1;
      return centre(far(a)) - centre(far(b)) || (declared.get(a) ?? 0) - (declared.get(b) ?? 0);
    };
    const exits = new Map<NodeId, Connection[]>();
    const entries = new Map<NodeId, Connection[]>();
    for (const e of layout.edges) {
      exits.set(e[0], [...(exits.get(e[0]) ?? []), e]);
      entries.set(e[1], [...(entries.get(e[1]) ?? []), e]);
    }
    const offset = (i: number, n: number, d: BoxDimensions) =>
      TB ? portOffsetTB(i, n, d.width) : portOffsetLR(i, n, d.height);

    const exitPorts = new Map<Connection, Point>();
    for (const [id, list] of exits) {
      const d = dimsOf(id);
      list.sort(bySlot((e) => e[1])).forEach((e, i) => {
        const main = layerStarts[layerOf(id)] + axes.mainSize(d) - 1;
        exitPorts.set(e, axes.point(main, (crossOf.get(id) ?? 0) + offset(i, list.length, d)));
      });
    }
    const entryPorts = new Map<Connection, Point>();
    for (const [id, list] of entries) {
      const d = dimsOf(id);
      list.sort(bySlot((e) => e[0])).forEach((e, i) => {
        entryPorts.set(e, axes.point(layerStarts[layerOf(id)], (crossOf.get(id) ?? 0) + offset(i, list.length, d)));
      });
    }

    const mainExtent = cursor + 1;
    const crossExtent = Math.max(corridor + widest + 1, demand?.crossExtent ?? 0);
    const { width, height } = axes.size(mainExtent, crossExtent);

    return {
      nodes,
      exitPorts,
      entryPorts,
      layerStarts,
      layerBands,
      lanes,
      corridor,
      gaps,
      crossStart: corridor,
      origin,
      width,
      height,
    };
  }
}
