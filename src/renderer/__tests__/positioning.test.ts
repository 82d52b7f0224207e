/**
 * Coordinate assignment tests
 *
 * - Port offsets along TB and LR borders
 * - Layer starts, corridor, gaps and canvas size
 * - Boxes grow to give every edge its own port
 * - Boxes never overlap
 */

import { describe, it, expect } from 'vitest';
import { PositionCalculator, assignLanes, portOffsetLR, portOffsetTB } from '../positioning.js';
import { computeLayout } from '../layout.js';
import { fitPorts, measureBox } from '../box-renderer.js';
import { DEFAULT_OPTIONS, type GeneratorOptions } from '../../core/options.js';
import type { Connection } from '../../core/types.js';
import type { BoxDimensions } from '../types.js';

function place(edges: Connection[], overrides: Partial<GeneratorOptions> = {}) {
  const opts: GeneratorOptions = { ...DEFAULT_OPTIONS, ...overrides };
  const layout = computeLayout(edges);
  const dims = new Map<string, BoxDimensions>();
  for (const ids of layout.layers) for (const id of ids) dims.set(id, measureBox(id, opts));
  return { layout, dims, positions: new PositionCalculator().calculate(layout, dims, opts) };
}

describe('port offsets', () => {
  it('centres a single TB port', () => {
    expect(portOffsetTB(0, 1, 10)).toBe(5);
  });

  it('spreads several TB ports along the border', () => {
    expect(portOffsetTB(0, 2, 10)).toBe(4);
    expect(portOffsetTB(1, 2, 10)).toBe(6);
    expect(portOffsetTB(2, 3, 10)).toBe(5);
  });

  it('keeps TB ports off the corners', () => {
    expect(portOffsetTB(5, 6, 10)).toBe(8);
  });

  it('uses the content rows for LR ports', () => {
    expect(portOffsetLR(0, 1, 5)).toBe(2);
    expect(portOffsetLR(0, 2, 5)).toBe(2);
    expect(portOffsetLR(1, 2, 5)).toBe(3);
    expect(portOffsetLR(1, 2, 3)).toBe(1);
  });
});

describe('PositionCalculator', () => {
  it('stacks layers top to bottom', () => {
    const { positions, layout } = place([['A', 'B']]);
    const [edge] = layout.edges;
    expect(positions.layerStarts).toEqual([0, 9]);
    expect(positions.layerBands).toEqual([6, 6]);
    expect(positions.nodes.get('A')).toEqual({ x: 0, y: 0 });
    expect(positions.nodes.get('B')).toEqual({ x: 0, y: 9 });
    expect(positions.exitPorts.get(edge)).toEqual({ x: 5, y: 4 });
    expect(positions.entryPorts.get(edge)).toEqual({ x: 5, y: 9 });
    expect(positions.width).toBe(12);
    expect(positions.height).toBe(16);
  });

  it('lines layers up left to right', () => {
    const { positions, layout } = place([['A', 'B']], { direction: 'LR', shadow: false, compact: true });
    const [edge] = layout.edges;
    expect(positions.nodes.get('B')).toEqual({ x: 22, y: 0 });
    expect(positions.exitPorts.get(edge)).toEqual({ x: 9, y: 1 });
    expect(positions.entryPorts.get(edge)).toEqual({ x: 22, y: 1 });
    expect(positions.width).toBe(33);
    expect(positions.height).toBe(4);
  });

  it('reserves a corridor and outer gaps for back edges', () => {
    const { positions } = place([['A', 'B'], ['B', 'C'], ['C', 'A']]);
    expect(positions.corridor).toBe(3);
    expect(positions.gaps).toEqual([3, 3, 3, 3]);
    expect(positions.layerStarts).toEqual([3, 12, 21]);
    expect(positions.nodes.get('A')).toEqual({ x: 3, y: 3 });
    expect(positions.width).toBe(15);
    expect(positions.height).toBe(31);
  });

  it('leaves no leading gap when no back edge enters the first layer', () => {
    const { positions } = place([['A', 'B'], ['B', 'C'], ['C', 'B']]);
    expect(positions.gaps).toEqual([0, 3, 3, 3]);
    expect(positions.layerStarts).toEqual([0, 9, 18]);
    expect(positions.nodes.get('A')).toEqual({ x: 3, y: 0 });
  });

  it('sizes gaps from the routing demand', () => {
    const layout = computeLayout([['A', 'B']]);
    const dims = new Map([
      ['A', measureBox('A', DEFAULT_OPTIONS)],
      ['B', measureBox('B', DEFAULT_OPTIONS)],
    ]);
    const positions = new PositionCalculator().calculate(layout, dims, DEFAULT_OPTIONS, undefined, {
      tracks: [0, 4, 0],
      crossExtent: 20,
    });
    expect(positions.gaps).toEqual([0, 6, 0]);
    expect(positions.layerStarts).toEqual([0, 12]);
    expect(positions.width).toBe(20);
    expect(positions.height).toBe(19);
  });

  it('puts back-edge slots nearest the corridor, inner lanes first', () => {
    const { positions, layout } = place([['A', 'B'], ['B', 'C'], ['C', 'A'], ['B', 'A']]);
    const entryX = (source: string) =>
      layout.edges.filter((e) => e[0] === source && e[1] === 'A').map((e) => positions.entryPorts.get(e)?.x);
    expect(positions.corridor).toBe(5);
    expect(entryX('B')).toEqual([9]);
    expect(entryX('C')).toEqual([11]);
  });

  it('gives every incoming edge its own entry port', () => {
    const { positions, layout } = place([['A', 'B'], ['A', 'C'], ['B', 'D'], ['C', 'D']]);
    const into = layout.edges.filter((e) => e[1] === 'D').map((e) => positions.entryPorts.get(e)?.x);
    expect(new Set(into).size).toBe(2);
  });

  it('never overlaps boxes', () => {
    const edges: Connection[] = [
      ['Start', 'Load configuration'], ['Start', 'Check'], ['Check', 'Load configuration'],
      ['Load configuration', 'Run'], ['Check', 'Run'], ['Run', 'Start'], ['Run', 'Done'],
    ];
    for (const direction of ['TB', 'LR'] as const) {
      const { positions, dims } = place(edges, { direction });
      const boxes = [...positions.nodes].map(([id, at]) => {
        const d = dims.get(id);
        return { id, x: at.x, y: at.y, w: (d?.width ?? 0) + 1, h: (d?.height ?? 0) + 1 };
      });
      for (const a of boxes) {
        expect(a.x + a.w).toBeLessThanOrEqual(positions.width);
        expect(a.y + a.h).toBeLessThanOrEqual(positions.height);
        for (const b of boxes) {
          if (a === b) continue;
          const apart = a.x + a.w <= b.x || b.x + b.w <= a.x || a.y + a.h <= b.y || b.y + b.h <= a.y;
          expect(apart).toBe(true);
        }
      }
    }
  });
});

describe('fitPorts', () => {
  const box = measureBox('T', DEFAULT_OPTIONS);

  it('keeps boxes with one port per side', () => {
    expect(fitPorts(box, 1, 'TB')).toBe(box);
  });

  it('widens TB boxes to two columns per port', () => {
    expect(fitPorts(box, 3, 'TB').width).toBe(12);
    expect(fitPorts(box, 8, 'TB').width).toBe(22);
  });

  it('deepens LR boxes to one row per port', () => {
    expect(fitPorts(box, 4, 'LR').height).toBe(7);
    expect(fitPorts(box, 2, 'LR').height).toBe(5);
  });

  it('spreads eight ports over a widened border without repeats', () => {
    const width = fitPorts(box, 8, 'TB').width;
    const offsets = Array.from({ length: 8 }, (_, i) => portOffsetTB(i, 8, width));
    expect(offsets).toEqual([4, 6, 8, 10, 12, 14, 16, 18]);
  });
});

describe('assignLanes', () => {
  it('puts the longest back edge outermost', () => {
    const layout = computeLayout([['A', 'B'], ['B', 'C'], ['C', 'B'], ['C', 'A']]);
    const lanes = assignLanes(layout);
    const laneOf = (s: string, t: string) => [...lanes].find(([e]) => e[0] === s && e[1] === t)?.[1];
    expect(laneOf('C', 'A')).toBe(0);
    expect(laneOf('C', 'B')).toBe(1);
  });
});
