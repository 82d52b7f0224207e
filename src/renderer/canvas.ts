import { CanvasSizeError } from '../core/errors.js';
import { mergeGlyphs } from './glyphs.js';

export type CellCategory = 'blank' | 'border' | 'text' | 'shadow' | 'line' | 'arrow';

/** Categories a caller may write; `blank` is only the initial state. */
export type WriteCategory = Exclude<CellCategory, 'blank'>;

export interface Cell {
  glyph: string;
  category: CellCategory;
}

export interface CanvasWrite {
  x: number;
  y: number;
  /** Glyph the caller asked for. */
  glyph: string;
  /** Glyph stored in the cell after the write (unchanged when skipped). */
  result: string;
  previous: string;
  category: WriteCategory;
  outcome: 'written' | 'merged' | 'skipped';
  reason?: string;
}

export interface CanvasObserver {
  onWrite(write: CanvasWrite): void;
}

export interface CanvasOptions {
  maxCells?: number;
  observer?: CanvasObserver;
}

const BLANK = ' ';

/** Right-trim each row, drop trailing blank rows and join with newlines. */
export function rowsToText(rows: readonly string[]): string {
  const trimmed = rows.map((r) => r.trimEnd());
  let end = trimmed.length;
  while (end > 0 && trimmed[end - 1] === '') end--;
  return trimmed.slice(0, end).join('\n');
}

/**
 * Fixed-size character grid. Every write goes through {@link Canvas.set},
 * which applies the category rules and merges line glyphs into junctions.
 */
export class Canvas {
  readonly width: number;
  readonly height: number;
  private readonly cells: Cell[][];
  private readonly observer?: CanvasObserver;

  constructor(width: number, height: number, options: CanvasOptions = {}) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`Canvas size must be non-negative integers, got ${width}x${height}`);
    }
    const limit = options.maxCells ?? Number.POSITIVE_INFINITY;
    if (width * height > limit) throw new CanvasSizeError(width, height, limit);
    this.width = width;
    this.height = height;
    this.observer = options.observer;
    this.cells = Array.from({ length: height }, () =>
      Array.from({ length: width }, (): Cell => ({ glyph: BLANK, category: 'blank' }))
    );
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  get(x: number, y: number): Cell | undefined {
    if (!this.inBounds(x, y)) return undefined;
    const c = this.cells[y][x];
    return { glyph: c.glyph, category: c.category };
  }

  /** Returns true when the cell changed or absorbed the fragment. Out-of-bounds writes are ignored. */
  set(x: number, y: number, glyph: string, category: WriteCategory, reason?: string): boolean {
    if (!this.inBounds(x, y)) return false;
    const cell = this.cells[y][x];
    const previous = cell.glyph;
    const next = resolveWrite(cell, glyph, category);
    const outcome: CanvasWrite['outcome'] = !next ? 'skipped' : next.merged ? 'merged' : 'written';
    if (next) {
      cell.glyph = next.glyph;
      cell.category = next.category;
    }
    this.observer?.onWrite({ x, y, glyph, result: cell.glyph, previous, category, outcome, reason });
    return next !== undefined;
  }

  /** Write a string left to right starting at (x, y). */
  write(x: number, y: number, text: string, category: WriteCategory, reason?: string): void {
    let i = 0;
    for (const ch of text) {
      this.set(x + i, y, ch, category, reason);
      i++;
    }
  }

  /** Equal-length rows. */
  toRows(): string[] {
    return this.cells.map((row) => row.map((c) => c.glyph).join(''));
  }

  toText(): string {
    return rowsToText(this.toRows());
  }
}

function resolveWrite(
  cell: Cell,
  glyph: string,
  category: WriteCategory
): { glyph: string; category: CellCategory; merged: boolean } | undefined {
  switch (category) {
    case 'border':
    case 'text':
    case 'arrow':
      if (category === 'arrow' && (cell.category === 'text' || cell.category === 'arrow')) return undefined;
      return { glyph, category, merged: false };
    case 'shadow':
      return cell.category === 'blank' ? { glyph, category, merged: false } : undefined;
    case 'line': {
      if (cell.category === 'blank' || cell.category === 'shadow') return { glyph, category, merged: false };
      if (cell.category !== 'line' && cell.category !== 'border') return undefined;
      const merged = mergeGlyphs(cell.glyph, glyph);
      if (merged === undefined) return undefined;
      // A line merged into a border stays part of the border.
      return { glyph: merged, category: cell.category, merged: true };
    }
  }
}
