import type { ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { ValidationError } from './types.js';

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  const ln = typeof line === 'number' && Number.isFinite(line) && line > 0 ? line : fallbackLine;
  const col = typeof column === 'number' && Number.isFinite(column) && column > 0 ? column : fallbackColumn;
  return { line: ln, column: col };
}

export function endOfTextPos(text: string) {
  const lines = text.split(/\r?\n/);
  const line = lines.length;
  const last = lines[lines.length - 1] ?? '';
  const column = Math.max(1, last.length + 1);
  return { line, column };
}

export function codeFrame(
  text: string,
  line: number,
  column: number,
  length = 1,
  contextLines = 1
): string {
  const lines = text.split(/\r?\n/);
  const idx = Math.max(0, Math.min(lines.length - 1, line - 1));
  const start = Math.max(0, idx - contextLines);
  const end = Math.min(lines.length - 1, idx + contextLines);
  const numWidth = String(end + 1).length;

  const parts: string[] = [];
  for (let i = start; i <= end; i++) {
    const lno = String(i + 1).padStart(numWidth, ' ');
    parts.push(`${lno} | ${lines[i] ?? ''}`);
    if (i === idx) {
      const caretPad = ' '.repeat(Math.max(0, column - 1));
      const marker = '^'.repeat(Math.max(1, Math.min(length, (lines[i] ?? '').length - column + 1)));
      parts.push(`${' '.repeat(numWidth)} | ${caretPad}${marker}`);
    }
  }
  return parts.join('\n');
}

export function fromLexerError(e: ILexingError): ValidationError {
  const { line, column } = coercePos(e.line, e.column);
  return {
    line,
    column,
    severity: 'error',
    code: 'FL-LEX',
    message: e.message,
    length: Math.max(1, e.length),
  };
}

// Helpers
function tokenName(t?: IToken | null): string {
  return t?.tokenType?.name ?? 'EOF';
}

function isInRule(err: IRecognitionException, name: string) {
  return err.context.ruleStack.includes(name);
}

// The parser reports EOF with NaN offsets, so fall back to the last real token.
function previousToken(err: IRecognitionException, tokens: IToken[]): IToken | undefined {
  const at = err.token.startOffset;
  if (!Number.isFinite(at)) return tokens[tokens.length - 1];
  let prev: IToken | undefined;
  for (const tk of tokens) {
    if (tk.startOffset >= at) break;
    prev = tk;
  }
  return prev;
}

export function mapFlowParserError(err: IRecognitionException, text: string, tokens: IToken[] = []): ValidationError {
  const tok = err.token;
  const posFallback = endOfTextPos(text);
  const { line, column } = coercePos(tok?.startLine ?? null, tok?.startColumn ?? null, posFallback.line, posFallback.column);
  const found = tokenName(tok);
  const prev = previousToken(err, tokens);
  const prevName = tokenName(prev);

  // An arrow with nothing usable before it: `-> B`, or a second arrow in `A -> -> B`
  if (found === 'Arrow') {
    if (prevName === 'Arrow') {
      return {
        line, column, severity: 'error', code: 'FL-EDGE-EMPTY-TARGET',
        message: 'Empty target node between two arrows.',
        hint: 'Example: A -> B -> C',
        length: 2
      };
    }
    return {
      line, column, severity: 'error', code: 'FL-EDGE-EMPTY-SOURCE',
      message: 'Empty source node before \'->\'.',
      hint: 'Example: A -> B',
      length: 2
    };
  }

  // `A ->` at the end of a line
  if (prevName === 'Arrow' && (found === 'Newline' || found === 'EOF')) {
    const p = coercePos(prev?.startLine, prev?.startColumn, line, column);
    return {
      ...p, severity: 'error', code: 'FL-EDGE-EMPTY-TARGET',
      message: 'Empty target node after \'->\'.',
      hint: 'Example: A -> B',
      length: 2
    };
  }

  // `A B`: a node name without an arrow
  if (isInRule(err, 'edgeStmt') && err.name === 'EarlyExitException') {
    const p = coercePos(prev?.startLine, prev?.startColumn, line, column);
    const image = prev?.image.trimEnd() ?? '';
    return {
      ...p, severity: 'error', code: 'FL-EDGE-MISSING-ARROW',
      message: `Expected '->' in connection: ${image}`,
      hint: 'Write connections as: A -> B',
      length: Math.max(1, image.length)
    };
  }

  return {
    line, column, severity: 'error', code: 'FL-PARSE',
    message: err.message,
    length: Math.max(1, tok?.image?.length ?? 1)
  };
}
