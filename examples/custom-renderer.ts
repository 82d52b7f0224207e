/**
 * Example demonstrating the pluggable renderer architecture
 *
 * This file shows how to:
 * 1. Use the built-in renderers
 * 2. Implement a custom renderer (JSON)
 * 3. Implement a custom layout engine
 */

import {
  renderFlow,
  DotRenderer,
  SvgRenderer,
  type FlowGraph,
  type ILayoutEngine,
  type IRenderer,
  type LayoutNode,
  type LayoutResult,
  type RenderedDiagram,
} from '../src/index.js';

// Example flowchart
const flow = `
# order handling
Receive order -> Check stock
Check stock -> Ship
Check stock -> Back order
Back order -> Check stock
Ship -> Invoice
`;

// ============================================================================
// Example 1: Default text renderer
// ============================================================================
console.log('Example 1: Default text renderer');
console.log('='.repeat(50));

const textResult = renderFlow(flow, { title: 'Orders' });
if (textResult.errors.length === 0) {
  console.log(textResult.output);
} else {
  console.error('✗ Errors:', textResult.errors);
}
console.log();

// ============================================================================
// Example 2: DOT and SVG renderers
// ============================================================================
console.log('Example 2: DOT renderer (Graphviz)');
console.log('='.repeat(50));

const dotResult = renderFlow(flow, {}, { renderer: new DotRenderer() });
console.log(dotResult.output);
console.log();

const svgResult = renderFlow(flow, { direction: 'LR' }, { renderer: new SvgRenderer() });
console.log(`✓ SVG generated: ${svgResult.output.length} bytes`);
console.log();

// ============================================================================
// Example 3: Custom JSON renderer
// ============================================================================
console.log('Example 3: Custom JSON renderer');
console.log('='.repeat(50));

class JsonRenderer implements IRenderer {
  render(diagram: RenderedDiagram): string {
    return JSON.stringify({
      size: { width: diagram.positions.width, height: diagram.positions.height },
      hasCycles: diagram.layout.hasCycles,
      nodes: [...diagram.layout.nodes].map(([id, n]) => ({
        id,
        layer: n.layer,
        order: n.order,
        position: diagram.positions.nodes.get(id),
      })),
      edges: diagram.layout.edges.map(([from, to]) => ({ from, to })),
    }, null, 2);
  }
}

const jsonResult = renderFlow(flow, {}, { renderer: new JsonRenderer() });
console.log(jsonResult.output);
console.log();

// ============================================================================
// Example 4: Custom layout engine (one node per layer)
// ============================================================================
console.log('Example 4: Custom layout engine (single column)');
console.log('='.repeat(50));

class ColumnLayoutEngine implements ILayoutEngine {
  layout(graph: FlowGraph): LayoutResult {
    const layers = graph.nodes.map((id) => [id]);
    const nodes = new Map<string, LayoutNode>(graph.nodes.map((id, i) => [id, { layer: i, order: 0 }]));
    const backEdges = new Set(graph.edges.filter(([s, t]) => (nodes.get(t)?.layer ?? 0) <= (nodes.get(s)?.layer ?? 0)));
    return { nodes, layers, edges: [...graph.edges], backEdges, hasCycles: backEdges.size > 0 };
  }
}

const columnResult = renderFlow(flow, { compact: true }, { layoutEngine: new ColumnLayoutEngine() });
console.log(columnResult.output);
console.log();

console.log('='.repeat(50));
console.log('All examples completed!');
