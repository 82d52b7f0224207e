/**
 * Command-line argument parsing tests
 */

import { describe, it, expect } from 'vitest';
import { UsageError, formatFromPath, parseRenderArgs, splitGlobs } from '../cli-args.js';

describe('parseRenderArgs', () => {
    it('defaults to text on stdout', () => {
        expect(parseRenderArgs(['flow.txt'])).toEqual({
            input: 'flow.txt',
            output: undefined,
            format: 'text',
            engine: 'layered',
            trace: false,
            configPath: undefined,
            options: {},
        });
    });

    it('collects option flags', () => {
        const args = parseRenderArgs(['in.flow', 'out.svg', '--rounded', '-d', 'lr', '--max-text-width', '30', '--no-shadow']);
        expect(args.input).toBe('in.flow');
        expect(args.output).toBe('out.svg');
        expect(args.format).toBe('svg');
        expect(args.options).toEqual({ rounded: true, direction: 'lr', maxTextWidth: 30, shadow: false });
    });

    it('lets --format win over the output extension', () => {
        expect(parseRenderArgs(['in.flow', '-o', 'out.svg', '--format', 'dot']).format).toBe('dot');
    });

    it('reads engine, trace, title and config', () => {
        const args = parseRenderArgs(['-', '--engine', 'dagre', '--trace', '-t', 'Build', '--config', 'gridflow.json']);
        expect(args.input).toBe('-');
        expect(args.engine).toBe('dagre');
        expect(args.trace).toBe(true);
        expect(args.configPath).toBe('gridflow.json');
        expect(args.options.title).toBe('Build');
    });

    it('rejects bad values', () => {
        expect(() => parseRenderArgs(['--vertical-spacing', 'wide'])).toThrow("--vertical-spacing expects a number, got 'wide'");
        expect(() => parseRenderArgs(['--format', 'png'])).toThrow(UsageError);
        expect(() => parseRenderArgs(['--engine', 'elk'])).toThrow(UsageError);
        expect(() => parseRenderArgs(['--title'])).toThrow('Missing value for --title');
        expect(() => parseRenderArgs(['--bogus'])).toThrow('Unknown option --bogus');
    });
});

describe('helpers', () => {
    it('infers the format from the file extension', () => {
        expect(formatFromPath('a.SVG')).toBe('svg');
        expect(formatFromPath('a.gv')).toBe('dot');
        expect(formatFromPath('a.txt')).toBe('text');
        expect(formatFromPath('a.png')).toBeUndefined();
    });

    it('splits comma-separated globs', () => {
        expect(splitGlobs('**/*.flow, docs/**/*.md,,')).toEqual(['**/*.flow', 'docs/**/*.md']);
    });
});
