import { rowsToText } from './canvas.js';
import type { IRenderer } from './interfaces.js';
import type { RenderedDiagram } from './types.js';
import { escapeXml } from './utils.js';

export interface SvgRendererOptions {
  fontSize?: number;
  /** Advance of one monospace cell in px. */
  charWidth?: number;
  lineHeight?: number;
  padding?: number;
  background?: string;
  foreground?: string;
}

/**
 * Draws the character grid as monospace text, one `<text>` element per row.
 */
export class SvgRenderer implements IRenderer {
  private readonly fontSize: number;
  private readonly charWidth: number;
  private readonly lineHeight: number;
  private readonly padding: number;
  private readonly background: string;
  private readonly foreground: string;

  constructor(options: SvgRendererOptions = {}) {
    this.fontSize = options.fontSize ?? 14;
    this.charWidth = options.charWidth ?? 8.4;
    this.lineHeight = options.lineHeight ?? 17;
    this.padding = options.padding ?? 10;
    this.background = options.background ?? '#ffffff';
    this.foreground = options.foreground ?? '#1f2328';
  }

  render(diagram: RenderedDiagram): string {
    const text = rowsToText(diagram.rows);
    const rows = text ? text.split('\n') : [];
    const cols = Math.max(0, ...rows.map((r) => [...r].length));
    const width = round(this.padding * 2 + cols * this.charWidth);
    const height = round(this.padding * 2 + rows.length * this.lineHeight);
    // Baseline sits a quarter line above the bottom of each row.
    const baseline = (i: number) => round(this.padding + (i + 1) * this.lineHeight - this.lineHeight / 4);

    const lines: string[] = [];
    lines.push(`<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`);
    lines.push(`  <rect width="100%" height="100%" fill="${this.background}"/>`);
    lines.push(`  <g font-family="ui-monospace, Menlo, Consolas, monospace" font-size="${this.fontSize}" fill="${this.foreground}">`);
    rows.forEach((row, i) => {
      if (!row) return;
      lines.push(`    <text x="${this.padding}" y="${baseline(i)}" xml:space="preserve">${escapeXml(row)}</text>`);
    });
    lines.push('  </g>');
    lines.push('</svg>');
    return lines.join('\n');
  }
}

function round(n: number): number {
  return Math.round(n * 100) / 100;
}
