import type { CanvasObserver, CanvasWrite, WriteCategory } from './canvas.js';

/**
 * Records every canvas write for debugging layouts and merges.
 */
export class TraceRecorder implements CanvasObserver {
  readonly writes: CanvasWrite[] = [];

  onWrite(write: CanvasWrite): void {
    this.writes.push(write);
  }

  /** Writes that touched (x, y), oldest first. */
  at(x: number, y: number): CanvasWrite[] {
    return this.writes.filter((w) => w.x === x && w.y === y);
  }

  summary(): string {
    const categories: WriteCategory[] = ['border', 'text', 'shadow', 'line', 'arrow'];
    const count = (pred: (w: CanvasWrite) => boolean) => this.writes.filter(pred).length;
    const lines = [`writes: ${this.writes.length}`];
    for (const c of categories) {
      const n = count((w) => w.category === c);
      if (n > 0) lines.push(`  ${c}: ${n}`);
    }
    lines.push(`merged: ${count((w) => w.outcome === 'merged')}`);
    lines.push(`skipped: ${count((w) => w.outcome === 'skipped')}`);
    return lines.join('\n');
  }
}
