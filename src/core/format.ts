import type { ValidationError } from './types.js';

export type OutputFormat = 'text' | 'json';

export interface ReportOptions {
  /** Wrap severities and carets in ANSI colours. */
  color?: boolean;
}

export function groupErrors(errors: ValidationError[]) {
  const errs = errors.filter(e => e.severity === 'error');
  const warns = errors.filter(e => e.severity === 'warning');
  return { errs, warns };
}

export function textReport(filename: string, content: string, errors: ValidationError[], opts: ReportOptions = {}): string {
  const { errs, warns } = groupErrors(errors);
  if (errs.length === 0 && warns.length === 0) return 'Valid';
  const paint = (code: string, s: string) => (opts.color === false ? s : `\x1b[${code}m${s}\x1b[0m`);
  const allLines = content.split(/\r?\n/);
  const numWidth = String(allLines.length + 1).length;
  const fmtNum = (n: number) => String(n).padStart(numWidth, ' ');
  const lines: string[] = [];

  const printBlock = (kind: 'error' | 'warning', e: ValidationError) => {
    const label = kind === 'error' ? paint('31', 'error') : paint('33', 'warning');
    lines.push(`${label}${e.code ? `[${e.code}]` : ''}: ${e.message}`);
    lines.push(`at ${filename}:${e.line}:${e.column}`);
    const idx = Math.max(0, Math.min(allLines.length - 1, e.line - 1));
    const prev = idx > 0 ? allLines[idx - 1] : undefined;
    const next = idx + 1 < allLines.length ? allLines[idx + 1] : undefined;
    if (typeof prev === 'string') lines.push(`  ${fmtNum(idx)} | ${prev}`);
    lines.push(`  ${fmtNum(idx + 1)} | ${allLines[idx] ?? ''}`);
    const caretPad = ' '.repeat(Math.max(0, e.column - 1));
    const caretLen = Math.max(1, e.length ?? 1);
    lines.push(`  ${' '.repeat(numWidth)} | ${caretPad}${paint('31', '^'.repeat(caretLen))}`);
    if (typeof next === 'string') lines.push(`  ${fmtNum(idx + 2)} | ${next}`);
    if (e.hint) {
      const hintLines = String(e.hint).split(/\r?\n/);
      lines.push(`hint: ${hintLines[0]}`);
      for (let i = 1; i < hintLines.length; i++) lines.push(`  ${hintLines[i]}`);
    }
    lines.push('');
  };

  for (const e of errs) printBlock('error', e);
  for (const w of warns) printBlock('warning', w);
  return lines.join('\n');
}

export function toJsonResult(filename: string, errors: ValidationError[]) {
  const { errs, warns } = groupErrors(errors);
  return {
    file: filename,
    valid: errs.length === 0,
    errorCount: errs.length,
    warningCount: warns.length,
    errors: errs,
    warnings: warns,
  };
}
