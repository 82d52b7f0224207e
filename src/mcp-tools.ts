import { z } from 'zod';
import { DirectionSchema } from './core/options.js';
import { validateDocument } from './core/document.js';
import type { ValidationError } from './core/types.js';
import { renderFlow } from './renderer/index.js';
import { SvgRenderer } from './renderer/svg-renderer.js';
import { DotRenderer } from './renderer/dot-renderer.js';
import { TextRenderer } from './renderer/text-renderer.js';

// Input schemas using Zod
export const RenderFlowchartSchema = z.object({
  text: z.string().describe('Flow text: one "A -> B" connection per line'),
  direction: DirectionSchema.optional(),
  title: z.string().optional(),
  shadow: z.boolean().optional(),
  rounded: z.boolean().optional(),
  compact: z.boolean().optional(),
  format: z.enum(['text', 'svg', 'dot']).optional(),
});

export const ValidateFlowchartSchema = z.object({
  text: z.string().describe('Flow text, or Markdown content with ```gridflow blocks'),
});

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: { type: 'object'; properties: Record<string, object>; required: string[] };
}

export const TOOLS: ToolDefinition[] = [
  {
    name: 'render_flowchart',
    description:
      'Draw a flowchart as box-drawing text art. Input is one connection per line ("A -> B"); cycles are allowed ' +
      'and routed around the diagram. Returns the drawing, or JSON diagnostics when the input is invalid.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Flow text: one "A -> B" connection per line' },
        direction: { type: 'string', enum: ['TB', 'LR'], description: 'Top-to-bottom (default) or left-to-right' },
        title: { type: 'string', description: 'Title drawn above the diagram' },
        shadow: { type: 'boolean', description: 'Draw box shadows (default true)' },
        rounded: { type: 'boolean', description: 'Rounded box corners' },
        compact: { type: 'boolean', description: 'No blank padding rows inside boxes' },
        format: { type: 'string', enum: ['text', 'svg', 'dot'], description: 'Output format (default text)' },
      },
      required: ['text'],
    },
  },
  {
    name: 'validate_flowchart',
    description: 'Validate flow text (or Markdown with ```gridflow blocks) and return diagnostics as JSON.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Flow text or Markdown content with ```gridflow blocks' },
      },
      required: ['text'],
    },
  },
];

function json(value: unknown, isError = false): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }], ...(isError ? { isError } : {}) };
}

function summary(errors: ValidationError[]) {
  const errorCount = errors.filter((e) => e.severity === 'error').length;
  return {
    valid: errorCount === 0,
    errorCount,
    warningCount: errors.filter((e) => e.severity === 'warning').length,
    errors,
  };
}

/**
 * Runs one tool call. Throws on an unknown tool or invalid arguments.
 */
export function handleToolCall(name: string, args: unknown): ToolResult {
  try {
    if (name === 'render_flowchart') {
      const { text, format, ...options } = RenderFlowchartSchema.parse(args);
      const renderer = format === 'svg' ? new SvgRenderer() : format === 'dot' ? new DotRenderer() : new TextRenderer();
      const res = renderFlow(text, options, { renderer });
      if (res.errors.some((e) => e.severity === 'error')) return json(summary(res.errors), true);
      return { content: [{ type: 'text', text: res.output }] };
    }

    if (name === 'validate_flowchart') {
      const { text } = ValidateFlowchartSchema.parse(args);
      const { errors, diagramCount } = validateDocument(text, '<input>');
      return json({ ...summary(errors), diagramCount });
    }

    throw new Error(`Unknown tool: ${name}`);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error(`Invalid arguments: ${error.message}`);
    }
    throw error;
  }
}
