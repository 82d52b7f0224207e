import type { IRenderer } from './interfaces.js';
import type { RenderedDiagram } from './types.js';
import { escapeDotLabel } from './utils.js';

/**
 * Graphviz DOT of the laid-out graph: one `rank=same` subgraph per layer,
 * back edges dashed.
 */
export class DotRenderer implements IRenderer {
  render(diagram: RenderedDiagram): string {
    const { layout } = diagram;
    const q = (id: string) => `"${escapeDotLabel(id)}"`;
    const lines: string[] = [];

    lines.push('digraph gridflow {');
    lines.push(`  rankdir=${diagram.direction};`);
    lines.push('  node [shape=box];');
    if (diagram.title) lines.push(`  label=${q(diagram.title)};`, '  labelloc=t;');
    lines.push('');

    for (const ids of layout.layers) {
      lines.push(`  { rank=same; ${ids.map((id) => `${q(id)};`).join(' ')} }`);
    }

    lines.push('');

    for (const edge of layout.edges) {
      const style = layout.backEdges.has(edge) ? ' [style=dashed]' : '';
      lines.push(`  ${q(edge[0])} -> ${q(edge[1])}${style};`);
    }

    lines.push('}');
    return lines.join('\n');
  }
}
