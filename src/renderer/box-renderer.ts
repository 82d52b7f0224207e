import type { Direction, GeneratorOptions } from '../core/options.js';
import type { Canvas } from './canvas.js';
import { DOUBLE, ROUNDED_BOX, SHADOW, SQUARE, type BoxGlyphs } from './glyphs.js';
import type { BoxDimensions, Point } from './types.js';

/**
 * Greedy word wrap. Words longer than `maxWidth` are cut into chunks of
 * `maxWidth` characters.
 */
export function wrapText(text: string, maxWidth: number): string[] {
  const width = Math.max(1, Math.floor(maxWidth));
  const words = text.split(/\s+/).filter(Boolean).flatMap((w) => {
    const chars = [...w];
    if (chars.length <= width) return [w];
    const chunks: string[] = [];
    for (let i = 0; i < chars.length; i += width) chunks.push(chars.slice(i, i + width).join(''));
    return chunks;
  });
  if (words.length === 0) return [''];

  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    if (!current) current = word;
    else if (cellWidth(current) + 1 + cellWidth(word) <= width) current += ` ${word}`;
    else {
      lines.push(current);
      current = word;
    }
  }
  lines.push(current);
  return lines;
}

export function cellWidth(s: string): number {
  return [...s].length;
}

type BoxSizing = Pick<GeneratorOptions, 'maxTextWidth' | 'minBoxWidth' | 'compact'>;

export function measureBox(label: string, options: BoxSizing): BoxDimensions {
  const lines = wrapText(label, options.maxTextWidth);
  const longest = Math.max(...lines.map(cellWidth));
  return {
    width: Math.max(options.minBoxWidth, longest + 4),
    height: lines.length + (options.compact ? 2 : 4),
    lines,
  };
}

/**
 * Grows a box until each of `ports` edges meeting one border gets a cell of
 * its own: two columns per port on TB borders, one row per port on LR sides.
 */
export function fitPorts(dims: BoxDimensions, ports: number, direction: Direction): BoxDimensions {
  if (ports < 2) return dims;
  return direction === 'TB'
    ? { ...dims, width: Math.max(dims.width, 2 * ports + 6) }
    : { ...dims, height: Math.max(dims.height, ports + 3) };
}

function frame(canvas: Canvas, at: Point, dims: BoxDimensions, g: BoxGlyphs, reason: string): void {
  const { x, y } = at;
  const right = x + dims.width - 1;
  const bottom = y + dims.height - 1;
  canvas.set(x, y, g.topLeft, 'border', reason);
  canvas.set(right, y, g.topRight, 'border', reason);
  canvas.set(x, bottom, g.bottomLeft, 'border', reason);
  canvas.set(right, bottom, g.bottomRight, 'border', reason);
  for (let cx = x + 1; cx < right; cx++) {
    canvas.set(cx, y, g.horizontal, 'border', reason);
    canvas.set(cx, bottom, g.horizontal, 'border', reason);
  }
  for (let cy = y + 1; cy < bottom; cy++) {
    canvas.set(x, cy, g.vertical, 'border', reason);
    canvas.set(right, cy, g.vertical, 'border', reason);
  }
  // Label centred horizontally (floor) and vertically in the inner rows
  const top = y + 1 + Math.floor((dims.height - 2 - dims.lines.length) / 2);
  dims.lines.forEach((line, i) => {
    const left = x + Math.floor((dims.width - cellWidth(line)) / 2);
    canvas.write(left, top + i, line, 'text', reason);
  });
}

export function drawBox(
  canvas: Canvas,
  id: string,
  at: Point,
  dims: BoxDimensions,
  style: Pick<GeneratorOptions, 'rounded' | 'shadow'>
): void {
  frame(canvas, at, dims, style.rounded ? ROUNDED_BOX : SQUARE, `box ${id}`);
  if (!style.shadow) return;
  const reason = `shadow ${id}`;
  for (let r = 1; r < dims.height; r++) canvas.set(at.x + dims.width, at.y + r, SHADOW, 'shadow', reason);
  for (let c = 1; c <= dims.width; c++) canvas.set(at.x + c, at.y + dims.height, SHADOW, 'shadow', reason);
}

/** Title frame size; its block adds one blank row below the frame. */
export function measureTitle(title: string, maxTextWidth: number): BoxDimensions {
  const lines = wrapText(title, Math.max(maxTextWidth, 40));
  const longest = Math.max(...lines.map(cellWidth));
  return { width: longest + 4, height: lines.length + 2, lines };
}

export function drawTitle(canvas: Canvas, at: Point, dims: BoxDimensions): void {
  frame(canvas, at, dims, DOUBLE, 'title');
}
