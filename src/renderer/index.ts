import type { Connection, ValidationError } from '../core/types.js';
import { resolveOptions, type GeneratorOptions, type GeneratorOptionsInput } from '../core/options.js';
import { EmptyGraphError, ParseError, toValidationError } from '../core/errors.js';
import { parseFlow } from '../diagrams/flow/validate.js';
import { createGraph, type NodeId } from './graph.js';
import { LayeredLayoutEngine } from './layout.js';
import { PositionCalculator } from './positioning.js';
import { Canvas, type CanvasObserver } from './canvas.js';
import { drawBox, drawTitle, fitPorts, measureBox, measureTitle } from './box-renderer.js';
import { EdgeRouter } from './edge-router.js';
import { drawRoutes } from './edge-drawer.js';
import { TextRenderer } from './text-renderer.js';
import type { ILayoutEngine, IRenderer } from './interfaces.js';
import type { BoxDimensions, RenderedDiagram } from './types.js';

export interface GeneratorConfig {
  /** Custom layout engine (defaults to LayeredLayoutEngine) */
  layoutEngine?: ILayoutEngine;
  /** Custom renderer (defaults to TextRenderer) */
  renderer?: IRenderer;
  /** Receives every canvas write */
  observer?: CanvasObserver;
}

export interface GenerateResult {
  output: string;
  rows: string[];
  diagram: RenderedDiagram;
}

export interface RenderFlowResult {
  output: string;
  rows: string[];
  errors: ValidationError[];
}

/**
 * Main generator class that orchestrates the pipeline:
 * graph, layout, positions, canvas, boxes, edges, output.
 */
export class FlowchartGenerator {
  readonly options: GeneratorOptions;
  private layoutEngine: ILayoutEngine;
  private renderer: IRenderer;
  private observer?: CanvasObserver;
  private positions = new PositionCalculator();

  constructor(options: GeneratorOptionsInput = {}, config: GeneratorConfig = {}) {
    this.options = resolveOptions(options);
    this.layoutEngine = config.layoutEngine ?? new LayeredLayoutEngine({ sweeps: this.options.sweeps });
    this.renderer = config.renderer ?? new TextRenderer();
    this.observer = config.observer;
  }

  /**
   * Draws flow text or a connection list. Throws ParseError for invalid
   * text and EmptyGraphError when there is nothing to draw.
   */
  generate(input: string | readonly Connection[]): GenerateResult {
    const connections = typeof input === 'string' ? parseConnections(input) : checkConnections(input);
    const diagram = this.draw(connections);
    return { output: this.renderer.render(diagram), rows: diagram.rows, diagram };
  }

  draw(connections: readonly Connection[]): RenderedDiagram {
    const opts = this.options;
    const graph = createGraph(connections);
    if (graph.size === 0) throw new EmptyGraphError();

    const layout = this.layoutEngine.layout(graph);
    const dimensions = new Map<NodeId, BoxDimensions>();
    for (const id of graph.nodes) {
      const ports = Math.max(
        layout.edges.filter((e) => e[0] === id).length,
        layout.edges.filter((e) => e[1] === id).length
      );
      dimensions.set(id, fitPorts(measureBox(id, opts), ports, opts.direction));
    }

    // Track counts depend only on the cross axis, so one routing pass sizes the gaps.
    const draft = this.positions.calculate(layout, dimensions, opts);
    const demand = new EdgeRouter(layout, draft, dimensions, opts).demand();
    let positions = this.positions.calculate(layout, dimensions, opts, undefined, demand);
    const title = opts.title?.trim() ? measureTitle(opts.title.trim(), opts.maxTextWidth) : undefined;
    let width = positions.width;
    let height = positions.height;
    if (title) {
      width = Math.max(positions.width, title.width);
      const origin = { x: Math.floor((width - positions.width) / 2), y: title.height + 1 };
      positions = this.positions.calculate(layout, dimensions, opts, origin, demand);
      height = origin.y + positions.height;
    }

    const canvas = new Canvas(width, height, { maxCells: opts.maxCanvasCells, observer: this.observer });
    if (title) drawTitle(canvas, { x: Math.floor((width - title.width) / 2), y: 0 }, title);
    for (const ids of layout.layers) {
      for (const id of ids) {
        const at = positions.nodes.get(id);
        const dims = dimensions.get(id);
        if (at && dims) drawBox(canvas, id, at, dims, opts);
      }
    }
    drawRoutes(canvas, new EdgeRouter(layout, positions, dimensions, opts).routeAll());

    return {
      rows: canvas.toRows(),
      layout,
      positions,
      dimensions,
      direction: opts.direction,
      title: opts.title?.trim() || undefined,
    };
  }
}

function parseConnections(text: string): Connection[] {
  const parsed = parseFlow(text);
  const errors = parsed.errors.filter((e) => e.severity === 'error');
  if (errors.length > 0) throw new ParseError(errors);
  return parsed.connections;
}

function checkConnections(connections: readonly Connection[]): Connection[] {
  const out: Connection[] = [];
  const errors: ValidationError[] = [];
  connections.forEach(([source, target], i) => {
    const s = source.trim();
    const t = target.trim();
    if (!s || !t) {
      errors.push({
        line: i + 1,
        column: 1,
        severity: 'error',
        code: s ? 'FL-EDGE-EMPTY-TARGET' : 'FL-EDGE-EMPTY-SOURCE',
        message: `Connection ${i + 1} has an empty ${s ? 'target' : 'source'} node.`,
      });
      return;
    }
    out.push([s, t]);
  });
  if (errors.length > 0) throw new ParseError(errors);
  return out;
}

export function generateFlowchart(
  input: string | readonly Connection[],
  options: GeneratorOptionsInput = {},
  config: GeneratorConfig = {}
): string {
  return new FlowchartGenerator(options, config).generate(input).output;
}

/** Like generateFlowchart, but reports every failure as diagnostics instead of throwing. */
export function renderFlow(
  text: string,
  options: GeneratorOptionsInput = {},
  config: GeneratorConfig = {}
): RenderFlowResult {
  let generator: FlowchartGenerator;
  try {
    generator = new FlowchartGenerator(options, config);
  } catch (error) {
    return { output: '', rows: [], errors: [toValidationError(error)] };
  }
  const parsed = parseFlow(text);
  if (parsed.errors.some((e) => e.severity === 'error')) {
    return { output: '', rows: [], errors: parsed.errors };
  }
  try {
    const res = generator.generate(parsed.connections);
    return { output: res.output, rows: res.rows, errors: parsed.errors };
  } catch (error) {
    return { output: '', rows: [], errors: [...parsed.errors, toValidationError(error)] };
  }
}
