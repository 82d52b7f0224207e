import type { Canvas } from './canvas.js';
import { ARROWS, DOWN, LEFT, RIGHT, UP, glyphFor, type Directions } from './glyphs.js';
import type { EdgeRoute, Point } from './types.js';

const OPPOSITE: Readonly<Record<number, Directions>> = { [UP]: DOWN, [DOWN]: UP, [LEFT]: RIGHT, [RIGHT]: LEFT };

function stepDirection(a: Point, b: Point): Directions {
  if (a.x !== b.x && a.y !== b.y) {
    throw new Error(`Route segment (${a.x},${a.y}) -> (${b.x},${b.y}) is not axis-aligned`);
  }
  if (b.x > a.x) return RIGHT;
  if (b.x < a.x) return LEFT;
  return b.y > a.y ? DOWN : UP;
}

function arrowFor(dir: Directions): string {
  switch (dir) {
    case UP: return ARROWS.up;
    case LEFT: return ARROWS.left;
    case RIGHT: return ARROWS.right;
    default: return ARROWS.down;
  }
}

/**
 * Writes a route cell by cell. Each cell gets the directions the route
 * enters and leaves it by; the last cell gets the arrowhead.
 */
export function drawRoute(canvas: Canvas, route: EdgeRoute): void {
  const pts = route.points;
  if (pts.length < 2) return;
  const reason = `${route.kind} edge ${route.edge[0]} -> ${route.edge[1]}`;
  const cells = new Map<string, { x: number; y: number; dirs: Directions }>();
  const add = (x: number, y: number, dir: Directions) => {
    const key = `${x},${y}`;
    const cell = cells.get(key);
    if (cell) cell.dirs |= dir;
    else cells.set(key, { x, y, dirs: dir });
  };

  let last: Directions = DOWN;
  for (let i = 0; i + 1 < pts.length; i++) {
    const a = pts[i];
    const b = pts[i + 1];
    const dir = stepDirection(a, b);
    const dx = Math.sign(b.x - a.x);
    const dy = Math.sign(b.y - a.y);
    for (let x = a.x, y = a.y; x !== b.x || y !== b.y; x += dx, y += dy) {
      add(x, y, dir);
      add(x + dx, y + dy, OPPOSITE[dir]);
    }
    last = dir;
  }

  const end = pts[pts.length - 1];
  for (const c of cells.values()) {
    if (c.x === end.x && c.y === end.y) continue;
    canvas.set(c.x, c.y, glyphFor(c.dirs), 'line', reason);
  }
  canvas.set(end.x, end.y, arrowFor(last), 'arrow', reason);
}

export function drawRoutes(canvas: Canvas, routes: readonly EdgeRoute[]): void {
  for (const r of routes) drawRoute(canvas, r);
}
