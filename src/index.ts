// Public SDK surface for programmatic use
// Re-export core types
export type {
  ValidationError,
  DiagnosticCode,
  Connection,
  GroupDefinition,
  ParseResult,
} from './core/types.js';

// Options and errors
export type { Direction, GeneratorOptions, GeneratorOptionsInput } from './core/options.js';
export { GeneratorOptionsSchema, DEFAULT_OPTIONS, resolveOptions } from './core/options.js';
export {
  GridflowError,
  EmptyGraphError,
  CanvasSizeError,
  ConfigError,
  ParseError,
  toValidationError,
} from './core/errors.js';

// Parsing and validation
export { parseFlow, validateFlow } from './diagrams/flow/validate.js';

// Documents and fenced blocks
export type { BlockSettings, FlowSource } from './core/document.js';
export { fencedFlows, flowSources, offsetErrors, validateDocument } from './core/document.js';

// Formatting
export { textReport, toJsonResult } from './core/format.js';

// Generator
export type { GeneratorConfig, GenerateResult, RenderFlowResult } from './renderer/index.js';
export { FlowchartGenerator, generateFlowchart, renderFlow } from './renderer/index.js';

// Layout, canvas and rendering building blocks
export type { NodeId } from './renderer/graph.js';
export { FlowGraph, createGraph } from './renderer/graph.js';
export type { ILayoutEngine, IRenderer } from './renderer/interfaces.js';
export type {
  LayoutNode,
  LayoutResult,
  BoxDimensions,
  Point,
  Positions,
  EdgeRoute,
  RenderedDiagram,
} from './renderer/types.js';
export { LayeredLayoutEngine, computeLayout, findBackEdges } from './renderer/layout.js';
export { DagreLayoutEngine } from './renderer/dagre-layout.js';
export { PositionCalculator } from './renderer/positioning.js';
export type { Cell, CellCategory, CanvasWrite, CanvasObserver } from './renderer/canvas.js';
export { Canvas } from './renderer/canvas.js';
export { mergeGlyphs } from './renderer/glyphs.js';
export { wrapText, measureBox, drawBox } from './renderer/box-renderer.js';
export { EdgeRouter } from './renderer/edge-router.js';
export { drawRoute } from './renderer/edge-drawer.js';
export { TextRenderer } from './renderer/text-renderer.js';
export { SvgRenderer } from './renderer/svg-renderer.js';
export { DotRenderer } from './renderer/dot-renderer.js';
export { TraceRecorder } from './renderer/trace.js';
