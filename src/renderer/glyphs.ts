/** Open directions of a line glyph, as a bit set. */
export const UP = 1;
export const DOWN = 2;
export const LEFT = 4;
export const RIGHT = 8;

export type Directions = number;

// Masks 1..15 in order. Single directions use the half-line glyphs so a
// one-sided stub still merges correctly with the border it touches.
const BY_MASK: readonly string[] = [
  ' ', '╵', '╷', '│', '╴', '┘', '┐', '┤', '╶', '└', '┌', '├', '─', '┴', '┬', '┼',
];

const ROUNDED: Readonly<Record<string, Directions>> = {
  '╭': DOWN | RIGHT,
  '╮': DOWN | LEFT,
  '╰': UP | RIGHT,
  '╯': UP | LEFT,
};

const MASKS = new Map<string, Directions>();
BY_MASK.forEach((g, mask) => {
  if (mask > 0) MASKS.set(g, mask);
});
for (const [g, mask] of Object.entries(ROUNDED)) MASKS.set(g, mask);

export function directionsOf(glyph: string): Directions | undefined {
  return MASKS.get(glyph);
}

export function glyphFor(dirs: Directions): string {
  const g = BY_MASK[dirs & 15];
  if (!g || dirs === 0) throw new RangeError(`No line glyph for direction set ${dirs}`);
  return g;
}

export function isLineGlyph(glyph: string): boolean {
  return MASKS.has(glyph);
}

/**
 * Merge a line fragment onto an existing line or border glyph.
 * Returns undefined when either glyph is outside the table. A fragment that
 * adds no direction keeps the existing glyph, so rounded corners survive.
 */
export function mergeGlyphs(existing: string, fragment: string): string | undefined {
  const a = directionsOf(existing);
  const b = directionsOf(fragment);
  if (a === undefined || b === undefined) return undefined;
  const union = a | b;
  if (union === a) return existing;
  if (union === b) return fragment;
  return glyphFor(union);
}

export interface BoxGlyphs {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

export const SQUARE: BoxGlyphs = {
  topLeft: '┌', topRight: '┐', bottomLeft: '└', bottomRight: '┘', horizontal: '─', vertical: '│',
};

export const ROUNDED_BOX: BoxGlyphs = {
  topLeft: '╭', topRight: '╮', bottomLeft: '╰', bottomRight: '╯', horizontal: '─', vertical: '│',
};

export const DOUBLE: BoxGlyphs = {
  topLeft: '╔', topRight: '╗', bottomLeft: '╚', bottomRight: '╝', horizontal: '═', vertical: '║',
};

export const SHADOW = '░';

export const ARROWS: Readonly<Record<'up' | 'down' | 'left' | 'right', string>> = {
  up: '▲',
  down: '▼',
  left: '◄',
  right: '►',
};
