import type { FlowGraph } from './graph.js';
import type { LayoutResult, RenderedDiagram } from './types.js';

/**
 * Interface for layout engines that assign layers and orders
 */
export interface ILayoutEngine {
  /**
   * Rank a graph into layers
   * @param graph The graph to layout
   * @returns Layer and order of every node, with back edges classified
   */
  layout(graph: FlowGraph): LayoutResult;
}

/**
 * Interface for renderers that generate output from a drawn diagram
 */
export interface IRenderer {
  /**
   * Generate output from the drawn grid and its layout
   * @returns String representation (text, SVG, DOT, etc.)
   */
  render(diagram: RenderedDiagram): string;
}
