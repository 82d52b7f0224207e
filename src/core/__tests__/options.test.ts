/**
 * Generator options and error mapping tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_OPTIONS, resolveOptions } from '../options.js';
import { CanvasSizeError, ConfigError, EmptyGraphError, ParseError, toValidationError } from '../errors.js';

describe('resolveOptions', () => {
  it('fills in defaults', () => {
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
    expect(DEFAULT_OPTIONS).toMatchObject({
      maxTextWidth: 22,
      minBoxWidth: 10,
      horizontalSpacing: 12,
      verticalSpacing: 3,
      shadow: true,
      rounded: false,
      compact: false,
      direction: 'TB',
      sweeps: 4,
    });
  });

  it('normalises the direction', () => {
    expect(resolveOptions({ direction: ' lr ' }).direction).toBe('LR');
  });

  it('reports every invalid field with its path', () => {
    try {
      resolveOptions({ maxTextWidth: 0, direction: 'up' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      if (!(e instanceof ConfigError)) return;
      expect(e.code).toBe('GF-CONFIG');
      expect(e.issues).toHaveLength(2);
      expect(e.issues[0].startsWith('maxTextWidth: ')).toBe(true);
      expect(e.issues[1].startsWith('direction: ')).toBe(true);
    }
  });

  it('rejects unknown keys', () => {
    expect(() => resolveOptions({ colour: 'red' })).toThrow(ConfigError);
  });
});

describe('toValidationError', () => {
  it('keeps the first parse diagnostic', () => {
    const first = { line: 3, column: 2, severity: 'error' as const, code: 'FL-PARSE', message: 'bad' };
    expect(toValidationError(new ParseError([first]))).toBe(first);
  });

  it('maps generator errors to their codes', () => {
    expect(toValidationError(new EmptyGraphError()).code).toBe('GF-EMPTY-GRAPH');
    expect(toValidationError(new CanvasSizeError(3, 4, 5))).toEqual({
      line: 1,
      column: 1,
      severity: 'error',
      code: 'GF-CANVAS-TOO-LARGE',
      message: 'Canvas of 3x4 cells exceeds the limit of 5 cells',
    });
  });

  it('wraps anything else as a render failure', () => {
    expect(toValidationError(new Error('boom'))).toMatchObject({ code: 'GF-RENDER', message: 'boom' });
    expect(toValidationError('plain')).toMatchObject({ code: 'GF-RENDER', message: 'plain' });
  });
});
