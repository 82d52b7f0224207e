import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DirectionSchema = z
  .string()
  .transform((v) => v.trim().toUpperCase())
  .pipe(z.enum(['TB', 'LR']));

export type Direction = z.infer<typeof DirectionSchema>;

export const GeneratorOptionsSchema = z
  .object({
    maxTextWidth: z.number().int().min(1).default(22).describe('Maximum label width before wrapping'),
    minBoxWidth: z.number().int().min(3).default(10).describe('Minimum box width, border included'),
    horizontalSpacing: z.number().int().min(2).default(12).describe('Cells between boxes horizontally'),
    verticalSpacing: z.number().int().min(2).default(3).describe('Cells between boxes vertically'),
    shadow: z.boolean().default(true),
    rounded: z.boolean().default(false),
    compact: z.boolean().default(false).describe('Drop the blank padding rows inside boxes'),
    direction: DirectionSchema.default('TB'),
    title: z.string().optional(),
    sweeps: z.number().int().min(0).max(32).default(4).describe('Barycenter sweep iterations'),
    maxCanvasCells: z.number().int().positive().default(4_000_000),
  })
  .strict();

export type GeneratorOptions = z.infer<typeof GeneratorOptionsSchema>;
export type GeneratorOptionsInput = z.input<typeof GeneratorOptionsSchema>;

export const DEFAULT_OPTIONS: GeneratorOptions = GeneratorOptionsSchema.parse({});

/**
 * Validate user supplied options and fill in defaults.
 * Throws ConfigError with one `path: message` entry per problem.
 */
export function resolveOptions(input: unknown = {}): GeneratorOptions {
  const res = GeneratorOptionsSchema.safeParse(input ?? {});
  if (res.success) return res.data;
  const issues = res.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
  throw new ConfigError(issues);
}
