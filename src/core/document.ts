import type { ValidationError } from './types.js';
import type { GeneratorOptionsInput } from './options.js';
import { validateFlow } from '../diagrams/flow/validate.js';

/** Options a fenced block may set for its own drawing. */
export type BlockSettings = Pick<GeneratorOptionsInput, 'direction' | 'title' | 'compact' | 'rounded' | 'shadow'>;

export interface FlowSource {
  content: string;
  /** Lines before the first content line in the enclosing file. */
  lineOffset: number;
  /** Settings from the opening fence, as in ```gridflow direction=LR title="Deploy" */
  settings: BlockSettings;
  /** Fence settings that were ignored, reported at the fence line. */
  warnings: ValidationError[];
}

const OPENING = /^ {0,3}(`{3,}|~{3,})\s*(?:gridflow|flow)(?:\s+(.*?))?\s*$/i;
const CLOSING = /^ {0,3}(`{3,}|~{3,})\s*$/;
const SETTING = /([A-Za-z]+)(?:=(?:"([^"]*)"|(\S+)))?/g;
const SWITCHES = ['compact', 'rounded', 'shadow'] as const;

function isSwitch(key: string): key is (typeof SWITCHES)[number] {
  return (SWITCHES as readonly string[]).includes(key);
}

function readSettings(attrs: string, line: number, column: number): Pick<FlowSource, 'settings' | 'warnings'> {
  const settings: BlockSettings = {};
  const warnings: ValidationError[] = [];
  for (const m of attrs.matchAll(SETTING)) {
    const [text, key, quoted, bare] = m;
    const value = quoted ?? bare;
    if (key === 'title' && value !== undefined) settings.title = value;
    else if (key === 'direction' && value !== undefined && /^(TB|LR)$/i.test(value)) settings.direction = value.toUpperCase();
    else if (isSwitch(key) && (value === undefined || value === 'true' || value === 'false')) settings[key] = value !== 'false';
    else {
      warnings.push({
        line,
        column: column + (m.index ?? 0),
        severity: 'warning',
        code: 'GF-FENCE-SETTING',
        message: `Ignoring fence setting '${text}'. Known settings: direction=TB|LR, title="...", compact, rounded, shadow.`,
      });
    }
  }
  return { settings, warnings };
}

/**
 * Fenced ```gridflow and ```flow blocks. A block runs to the first fence of
 * the same character at least as long as its opening one, or to the end of
 * the text.
 */
export function fencedFlows(text: string): FlowSource[] {
  const lines = text.split(/\r?\n/);
  const found: FlowSource[] = [];
  for (let i = 0; i < lines.length; i++) {
    const open = OPENING.exec(lines[i]);
    if (!open) continue;
    const fence = open[1];
    const attrs = open[2] ?? '';
    let end = i + 1;
    for (; end < lines.length; end++) {
      const close = CLOSING.exec(lines[end]);
      if (close && close[1][0] === fence[0] && close[1].length >= fence.length) break;
    }
    found.push({
      content: lines.slice(i + 1, end).join('\n'),
      lineOffset: i + 1,
      ...readSettings(attrs, i + 1, lines[i].lastIndexOf(attrs) + 1),
    });
    i = end;
  }
  return found;
}

export function offsetErrors(errors: ValidationError[], lineOffset: number): ValidationError[] {
  if (!lineOffset) return errors;
  return errors.map((e) => ({ ...e, line: e.line + lineOffset }));
}

export function isMarkdownPath(file: string): boolean {
  return /\.(md|markdown)$/i.test(file);
}

/**
 * Flow diagrams in a file: the fenced blocks when there are any, otherwise
 * the whole file unless it is Markdown.
 */
export function flowSources(content: string, filename: string): FlowSource[] {
  const blocks = fencedFlows(content);
  if (blocks.length > 0) return blocks;
  if (isMarkdownPath(filename)) return [];
  return [{ content, lineOffset: 0, settings: {}, warnings: [] }];
}

export function validateDocument(content: string, filename: string): { errors: ValidationError[]; diagramCount: number } {
  const sources = flowSources(content, filename);
  const errors = sources.flatMap((s) => [...s.warnings, ...offsetErrors(validateFlow(s.content), s.lineOffset)]);
  return { errors, diagramCount: sources.length };
}
