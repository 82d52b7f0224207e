import type { DiagnosticCode, ValidationError } from './types.js';

export class GridflowError extends Error {
  readonly code: DiagnosticCode;

  constructor(code: DiagnosticCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The graph has no nodes at all, so there is nothing to draw. */
export class EmptyGraphError extends GridflowError {
  constructor() {
    super('GF-EMPTY-GRAPH', 'Flowchart has no nodes; add at least one connection like "A -> B"');
  }
}

export class CanvasSizeError extends GridflowError {
  readonly width: number;
  readonly height: number;
  readonly limit: number;

  constructor(width: number, height: number, limit: number) {
    super(
      'GF-CANVAS-TOO-LARGE',
      `Canvas of ${width}x${height} cells exceeds the limit of ${limit} cells`
    );
    this.width = width;
    this.height = height;
    this.limit = limit;
  }
}

export class ConfigError extends GridflowError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('GF-CONFIG', `Invalid options: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class ParseError extends GridflowError {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    const first = errors[0];
    const where = first ? ` (line ${first.line}, column ${first.column})` : '';
    super('GF-PARSE', `${first?.message ?? 'Invalid flowchart input'}${where}`);
    this.errors = errors;
  }
}

export function toValidationError(err: unknown): ValidationError {
  if (err instanceof GridflowError) {
    if (err instanceof ParseError && err.errors.length > 0) return err.errors[0];
    return { line: 1, column: 1, severity: 'error', code: err.code, message: err.message };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { line: 1, column: 1, severity: 'error', code: 'GF-RENDER', message: message || 'Unknown error occurred' };
}
