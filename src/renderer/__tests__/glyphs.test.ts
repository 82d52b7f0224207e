/**
 * Merge resolver tests
 *
 * - Junction glyphs from overlapping fragments
 * - Commutativity and idempotence over the square glyph set
 * - Glyphs outside the table are never merged
 */

import { describe, it, expect } from 'vitest';
import { mergeGlyphs, directionsOf, glyphFor, UP, DOWN, LEFT, RIGHT } from '../glyphs.js';

const SQUARE_SET = ['─', '│', '┌', '┐', '└', '┘', '├', '┤', '┬', '┴', '┼', '╵', '╷', '╴', '╶'];

describe('mergeGlyphs', () => {
  it('builds junctions from the union of directions', () => {
    expect(mergeGlyphs('─', '│')).toBe('┼');
    expect(mergeGlyphs('│', '┌')).toBe('├');
    expect(mergeGlyphs('┌', '┐')).toBe('┬');
    expect(mergeGlyphs('└', '┘')).toBe('┴');
    expect(mergeGlyphs('─', '╷')).toBe('┬');
    expect(mergeGlyphs('│', '╶')).toBe('├');
  });

  it('lets the cross absorb everything', () => {
    for (const g of SQUARE_SET) {
      expect(mergeGlyphs(g, '┼')).toBe('┼');
      expect(mergeGlyphs('┼', g)).toBe('┼');
    }
  });

  it('is commutative', () => {
    for (const a of SQUARE_SET) {
      for (const b of SQUARE_SET) {
        expect(mergeGlyphs(a, b)).toBe(mergeGlyphs(b, a));
      }
    }
  });

  it('is idempotent', () => {
    for (const a of SQUARE_SET) {
      expect(mergeGlyphs(a, a)).toBe(a);
      for (const b of SQUARE_SET) {
        const once = mergeGlyphs(a, b);
        expect(once).toBeDefined();
        if (once !== undefined) expect(mergeGlyphs(once, b)).toBe(once);
      }
    }
  });

  it('keeps rounded corners when the fragment adds nothing', () => {
    expect(mergeGlyphs('╭', '╷')).toBe('╭');
    expect(mergeGlyphs('╭', '│')).toBe('├');
  });

  it('refuses glyphs outside the table', () => {
    expect(mergeGlyphs('═', '│')).toBeUndefined();
    expect(mergeGlyphs('│', 'A')).toBeUndefined();
    expect(mergeGlyphs('▼', '─')).toBeUndefined();
  });
});

describe('direction table', () => {
  it('maps glyphs to direction sets and back', () => {
    expect(directionsOf('┬')).toBe(DOWN | LEFT | RIGHT);
    expect(directionsOf('╰')).toBe(UP | RIGHT);
    expect(glyphFor(UP | DOWN)).toBe('│');
    expect(glyphFor(UP | DOWN | LEFT | RIGHT)).toBe('┼');
  });

  it('rejects the empty set', () => {
    expect(() => glyphFor(0)).toThrow(RangeError);
  });
});
