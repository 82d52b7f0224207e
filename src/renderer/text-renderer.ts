import { rowsToText } from './canvas.js';
import type { IRenderer } from './interfaces.js';
import type { RenderedDiagram } from './types.js';

export class TextRenderer implements IRenderer {
  render(diagram: RenderedDiagram): string {
    return rowsToText(diagram.rows);
  }
}
