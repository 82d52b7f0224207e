import * as path from 'node:path';
import type { GeneratorOptionsInput } from './core/options.js';

export type RenderFormat = 'text' | 'svg' | 'dot';
export type EngineName = 'layered' | 'dagre';

export interface RenderArgs {
  input?: string;
  output?: string;
  format: RenderFormat;
  engine: EngineName;
  trace: boolean;
  configPath?: string;
  /** Options given as flags; they win over the config file. */
  options: GeneratorOptionsInput;
}

const NUMERIC_FLAGS: Record<string, 'maxTextWidth' | 'minBoxWidth' | 'horizontalSpacing' | 'verticalSpacing'> = {
    '--max-text-width': 'maxTextWidth',
    '--min-box-width': 'minBoxWidth',
    '--horizontal-spacing': 'horizontalSpacing',
    '--vertical-spacing': 'verticalSpacing',
};

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function isFormat(v: string): v is RenderFormat {
    return v === 'text' || v === 'svg' || v === 'dot';
}

export function formatFromPath(file: string): RenderFormat | undefined {
    const ext = path.extname(file).toLowerCase();
    if (ext === '.svg') return 'svg';
    if (ext === '.dot' || ext === '.gv') return 'dot';
    if (ext === '.txt') return 'text';
    return undefined;
}

export function parseRenderArgs(args: string[]): RenderArgs {
    let format: RenderFormat | undefined;
    let output: string | undefined;
    let engine: EngineName = 'layered';
    let trace = false;
    let configPath: string | undefined;
    const options: GeneratorOptionsInput = {};
    const positionals: string[] = [];

    const value = (i: number, flag: string): string => {
        const v = args[i + 1];
        if (v === undefined) throw new UsageError(`Missing value for ${flag}`);
        return v;
    };

    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (a === '--format' || a === '-f') {
            const v = value(i, a).toLowerCase();
            if (!isFormat(v)) throw new UsageError(`Unknown format '${v}'. Use text, svg or dot.`);
            format = v; i++; continue;
        }
        if (a === '--output' || a === '-o') { output = value(i, a); i++; continue; }
        if (a === '--direction' || a === '-d') { options.direction = value(i, a); i++; continue; }
        if (a === '--title' || a === '-t') { options.title = value(i, a); i++; continue; }
        if (a === '--no-shadow') { options.shadow = false; continue; }
        if (a === '--rounded') { options.rounded = true; continue; }
        if (a === '--compact') { options.compact = true; continue; }
        if (a === '--trace') { trace = true; continue; }
        if (a === '--config') { configPath = value(i, a); i++; continue; }
        if (a === '--engine') {
            const v = value(i, a).toLowerCase();
            if (v !== 'layered' && v !== 'dagre') throw new UsageError(`Unknown engine '${v}'. Use layered or dagre.`);
            engine = v; i++; continue;
        }
        const numeric = NUMERIC_FLAGS[a];
        if (numeric) {
            const raw = value(i, a);
            const n = Number(raw);
            if (raw.trim() === '' || !Number.isFinite(n)) throw new UsageError(`${a} expects a number, got '${raw}'`);
            options[numeric] = n; i++; continue;
        }
        if (a === '-' || !a.startsWith('-')) { positionals.push(a); continue; }
        throw new UsageError(`Unknown option ${a}`);
    }

    output = output ?? positionals[1];
    return {
        input: positionals[0],
        output,
        format: format ?? (output ? formatFromPath(output) : undefined) ?? 'text',
        engine,
        trace,
        configPath,
        options,
    };
}

export function splitGlobs(v: string): string[] {
    return v.split(',').map((s) => s.trim()).filter(Boolean);
}
