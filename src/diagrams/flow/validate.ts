import type { ParseResult, ValidationError } from '../../core/types.js';
import { tokenize } from './lexer.js';
import { parse } from './parser.js';
import { analyzeFlow } from './semantics.js';
import { lintWithChevrotain } from '../../core/pipeline.js';
import { mapFlowParserError } from '../../core/diagnostics.js';

/**
 * Parse flow text into connections and group definitions.
 * Connections and groups are empty whenever lexing or parsing failed.
 */
export function parseFlow(text: string): ParseResult {
  const res = lintWithChevrotain(text, {
    tokenize,
    parse,
    analyze: analyzeFlow,
    mapParserError: mapFlowParserError,
  });
  return {
    connections: res.value?.connections ?? [],
    groups: res.value?.groups ?? [],
    errors: res.errors,
  };
}

export function validateFlow(text: string): ValidationError[] {
  return parseFlow(text).errors;
}
