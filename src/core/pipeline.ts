import type { CstNode, ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { ValidationError } from './types.js';
import { fromLexerError } from './diagnostics.js';

export interface Analysis<T> {
  value: T;
  errors: ValidationError[];
}

export interface LintAdapters<T> {
  tokenize: (text: string) => { tokens: IToken[]; errors: ILexingError[] };
  parse: (tokens: IToken[]) => { cst: CstNode | undefined; errors: IRecognitionException[] };
  analyze: (cst: CstNode, tokens: IToken[]) => Analysis<T>;
  mapParserError: (err: IRecognitionException, text: string, tokens: IToken[]) => ValidationError;
}

export interface LintResult<T> {
  /** Present when lexing and parsing succeeded and the semantics pass ran. */
  value?: T;
  errors: ValidationError[];
}

export function lintWithChevrotain<T>(text: string, adapters: LintAdapters<T>): LintResult<T> {
  const errors: ValidationError[] = [];

  // Lexing
  const lex = adapters.tokenize(text);
  if (lex.errors.length > 0) {
    errors.push(...lex.errors.map(fromLexerError));
    return { errors };
  }

  // Parsing
  const parseRes = adapters.parse(lex.tokens);
  if (parseRes.errors.length > 0) {
    errors.push(...parseRes.errors.map((e) => adapters.mapParserError(e, text, lex.tokens)));
    return { errors };
  }
  if (!parseRes.cst) return { errors };

  // Semantics
  try {
    const res = adapters.analyze(parseRes.cst, lex.tokens);
    errors.push(...res.errors);
    return { value: res.value, errors };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    errors.push({ line: 1, column: 1, severity: 'error', code: 'FL-PARSE', message: `Internal semantic analysis error: ${message}` });
    return { errors };
  }
}
