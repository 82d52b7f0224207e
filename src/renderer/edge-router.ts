import type { Connection } from '../core/types.js';
import type { NodeId } from './graph.js';
import { Axes, type PositionOptions } from './positioning.js';
import type { BoxDimensions, EdgeRoute, LayoutResult, Point, Positions, RoutingDemand } from './types.js';

/** A vertical line meeting a track, running to the gap's leading or trailing edge. */
interface Stub {
  cross: number;
  side: 'lead' | 'trail';
}

/** The horizontal leg of one route inside one gap. */
interface Run {
  gap: number;
  from: number;
  to: number;
  stubs: Stub[];
  /** Placement preference; smaller values sit nearer the gap's leading edge. */
  priority: [number, number];
  track: number;
}

interface Plan {
  edge: Connection;
  kind: 'forward' | 'back';
  lane?: number;
  runs: Run[];
}

function comparePriority(a: Run, b: Run): number {
  return a.priority[0] - b.priority[0] || a.priority[1] - b.priority[1];
}

/** True when a line leaving `before` towards the leading edge shares a column with one of `after`'s trailing lines. */
function mustPrecede(before: Run, after: Run): boolean {
  return before.stubs.some(
    (a) => a.side === 'lead' && after.stubs.some((b) => b.side === 'trail' && b.cross === a.cross)
  );
}

/**
 * Orders the runs of one gap so that no two vertical lines overlap, keeping
 * the preferred order where the columns allow it.
 */
function orderRuns(runs: Run[]): Run[] {
  const pending = [...runs].sort(comparePriority);
  const placed: Run[] = [];
  while (pending.length > 0) {
    const next = pending.findIndex((s) => !pending.some((r) => r !== s && mustPrecede(r, s)));
    placed.push(...pending.splice(Math.max(0, next), 1));
  }
  return placed;
}

/**
 * Computes orthogonal routes. Every horizontal leg gets a track of its own
 * in the gap it crosses, and every vertical line passing a layer gets its own
 * channel, so no two routes share a segment. Back edges leave through the
 * corridor lanes outside the boxes.
 */
export class EdgeRouter {
  private readonly axes: Axes;
  private readonly shade: number;
  private readonly plans = new Map<Connection, Plan>();
  /** Cross coordinates already carrying a vertical line through each layer. */
  private readonly taken = new Map<number, Set<number>>();
  private readonly tracks: number[];

  constructor(
    private readonly layout: LayoutResult,
    private readonly positions: Positions,
    private readonly dimensions: Map<NodeId, BoxDimensions>,
    options: PositionOptions
  ) {
    this.axes = new Axes(options.direction, positions.origin);
    this.shade = options.shadow ? 1 : 0;
    this.ordered().forEach((edge, seq) => {
      this.plans.set(edge, layout.backEdges.has(edge) ? this.planBack(edge) : this.planForward(edge, seq));
    });
    this.tracks = this.assignTracks();
  }

  /** Tracks per gap and cross extent the routes need; feed to PositionCalculator. */
  demand(): RoutingDemand {
    let reach = 0;
    for (const plan of this.plans.values()) {
      for (const run of plan.runs) reach = Math.max(reach, run.from, run.to);
    }
    return { tracks: [...this.tracks], crossExtent: reach + 1 };
  }

  /** Forward edges first, then back edges, each in declaration order. */
  routeAll(): EdgeRoute[] {
    return this.ordered().map((e) => this.route(e));
  }

  route(edge: Connection): EdgeRoute {
    const plan = this.plans.get(edge);
    if (!plan) throw new Error(`Edge ${edge[0]} -> ${edge[1]} is not part of the layout`);
    const { exit, entry } = this.ports(edge);
    const path: Array<[number, number]> = [[this.axes.main(exit), this.axes.cross(exit)]];
    for (const run of plan.runs) {
      const main = this.trackMain(run);
      path.push([main, run.from], [main, run.to]);
    }
    path.push([this.axes.main(entry) - 1, this.axes.cross(entry)]);
    const points = this.toCanvas(path);
    return plan.lane === undefined
      ? { edge, kind: plan.kind, points }
      : { edge, kind: plan.kind, points, lane: plan.lane };
  }

  private ordered(): Connection[] {
    const forward = this.layout.edges.filter((e) => !this.layout.backEdges.has(e));
    const back = this.layout.edges.filter((e) => this.layout.backEdges.has(e));
    return [...forward, ...back];
  }

  private layerOf(id: NodeId): number {
    return this.layout.nodes.get(id)?.layer ?? 0;
  }

  private ports(edge: Connection): { exit: Point; entry: Point } {
    const exit = this.positions.exitPorts.get(edge);
    const entry = this.positions.entryPorts.get(edge);
    if (!exit || !entry) throw new Error(`No ports for edge ${edge[0]} -> ${edge[1]}`);
    return { exit, entry };
  }

  /** Cross-axis range a vertical line must avoid: the footprint plus one leading cell. */
  private blockedRange(id: NodeId): { start: number; end: number } {
    const at = this.positions.nodes.get(id);
    const d = this.dimensions.get(id);
    if (!at || !d) throw new Error(`Node '${id}' has no position`);
    const start = this.axes.cross(at);
    return { start: start - 1, end: start + this.axes.crossSize(d) + this.shade - 1 };
  }

  private takenIn(l: number): Set<number> {
    let set = this.taken.get(l);
    if (!set) {
      set = new Set();
      this.taken.set(l, set);
    }
    return set;
  }

  private blocked(l: number, cross: number): boolean {
    if (this.takenIn(l).has(cross)) return true;
    return this.layout.layers[l].some((id) => {
      const r = this.blockedRange(id);
      return cross >= r.start && cross <= r.end;
    });
  }

  /** Nearest free channel past whatever blocks `cross` in layer `l`, on the side nearer `target`. */
  private channel(l: number, cross: number, target: number): number {
    const blocker = this.layout.layers[l]
      .map((id) => this.blockedRange(id))
      .find((r) => cross >= r.start && cross <= r.end);
    let right = (blocker?.end ?? cross) + 1;
    while (this.blocked(l, right)) right++;
    let left = (blocker?.start ?? cross) - 1;
    while (left >= this.positions.crossStart && this.blocked(l, left)) left--;
    const useLeft = left >= this.positions.crossStart && Math.abs(left - target) < Math.abs(right - target);
    return useLeft ? left : right;
  }

  private planForward(edge: Connection, seq: number): Plan {
    const { exit, entry } = this.ports(edge);
    const lt = this.layerOf(edge[1]);
    const target = this.axes.cross(entry);
    const leg = (gap: number, from: number, to: number): Run => ({
      gap,
      from,
      to,
      stubs: [
        { cross: from, side: 'lead' },
        { cross: to, side: 'trail' },
      ],
      priority: [1, seq],
      track: 0,
    });

    const runs: Run[] = [];
    let cross = this.axes.cross(exit);
    for (let l = this.layerOf(edge[0]) + 1; l < lt; l++) {
      if (this.blocked(l, cross)) {
        const side = this.channel(l, cross, target);
        runs.push(leg(l, cross, side));
        cross = side;
      }
      this.takenIn(l).add(cross);
    }
    if (cross !== target) runs.push(leg(lt, cross, target));
    return { edge, kind: 'forward', runs };
  }

  private planBack(edge: Connection): Plan {
    const { exit, entry } = this.ports(edge);
    const lane = this.positions.lanes.get(edge) ?? 0;
    const laneCross = 1 + 2 * lane;
    const from = this.axes.cross(exit);
    const to = this.axes.cross(entry);
    // Outer lanes take the tracks farthest from the boxes they leave and enter.
    const out: Run = {
      gap: this.layerOf(edge[0]) + 1,
      from,
      to: laneCross,
      stubs: [
        { cross: from, side: 'lead' },
        { cross: laneCross, side: 'lead' },
      ],
      priority: [2, -lane],
      track: 0,
    };
    const back: Run = {
      gap: this.layerOf(edge[1]),
      from: laneCross,
      to,
      stubs: [
        { cross: laneCross, side: 'trail' },
        { cross: to, side: 'trail' },
      ],
      priority: [0, lane],
      track: 0,
    };
    return { edge, kind: 'back', lane, runs: [out, back] };
  }

  private assignTracks(): number[] {
    const byGap = new Map<number, Run[]>();
    for (const plan of this.plans.values()) {
      for (const run of plan.runs) byGap.set(run.gap, [...(byGap.get(run.gap) ?? []), run]);
    }
    const counts = new Array<number>(this.layout.layers.length + 1).fill(0);
    for (const [gap, runs] of byGap) {
      counts[gap] = runs.length;
      orderRuns(runs).forEach((run, i) => {
        run.track = i;
      });
    }
    return counts;
  }

  /** Main-axis coordinate where the gap ends and the next layer begins. */
  private gapEnd(g: number): number {
    const { layerStarts, layerBands, gaps } = this.positions;
    if (g < layerStarts.length) return layerStarts[g];
    const last = layerStarts.length - 1;
    return layerStarts[last] + layerBands[last] + gaps[g];
  }

  /** Tracks sit centred in their gap, clear of the arrowhead row. */
  private trackMain(run: Run): number {
    const count = this.tracks[run.gap];
    const size = this.positions.gaps[run.gap];
    const first = this.gapEnd(run.gap) - 1 - Math.ceil((size - 1) / 2) - Math.floor((count - 1) / 2);
    return first + run.track;
  }

  private toCanvas(path: Array<[number, number]>): Point[] {
    const points: Point[] = [];
    for (const [m, c] of path) {
      const p = this.axes.point(m, c);
      const last = points[points.length - 1];
      if (last && last.x === p.x && last.y === p.y) continue;
      const prev = points[points.length - 2];
      if (prev && last && ((prev.x === last.x && last.x === p.x) || (prev.y === last.y && last.y === p.y))) {
        points[points.length - 1] = p;
        continue;
      }
      points.push(p);
    }
    return points;
  }
}
