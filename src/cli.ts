#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import type { ValidationError } from './core/types.js';
import { toJsonResult, textReport } from './core/format.js';
import { flowSources, offsetErrors, validateDocument } from './core/document.js';
import { resolveOptions } from './core/options.js';
import { GridflowError, ParseError } from './core/errors.js';
import { UsageError, parseRenderArgs, splitGlobs, type RenderArgs } from './cli-args.js';
import { FlowchartGenerator } from './renderer/index.js';
import { LayeredLayoutEngine } from './renderer/layout.js';
import { DagreLayoutEngine } from './renderer/dagre-layout.js';
import { TextRenderer } from './renderer/text-renderer.js';
import { SvgRenderer } from './renderer/svg-renderer.js';
import { DotRenderer } from './renderer/dot-renderer.js';
import { TraceRecorder } from './renderer/trace.js';
import type { IRenderer } from './renderer/interfaces.js';

// Main CLI execution
function printUsage() {
    console.log('Usage: gridflow [check] <file|directory|->');
    console.log('       gridflow render <input|-> [output]');
    console.log('  - Validates .flow/.gridflow files or Markdown with ```gridflow / ```flow fences');
    console.log('  - When a directory is given, scans recursively for .flow/.gridflow/.md/.markdown');
    console.log('  - "gridflow render" draws a flowchart as text, SVG or DOT');
    console.log('Options:');
    console.log('  --include, -I   Glob(s) to include (repeatable or comma-separated)');
    console.log('  --exclude, -E   Glob(s) to exclude (repeatable or comma-separated)');
    console.log('  --no-gitignore  Do not respect .gitignore when scanning directories');
    console.log('  --format, -f    Output format: text|json (default: text)');
}

function printRenderUsage() {
    console.log('Usage: gridflow render <input> [output.txt|output.svg|output.dot]');
    console.log('       cat chart.flow | gridflow render - [output]');
    console.log('');
    console.log('Options:');
    console.log('  --direction, -d         Layout direction: TB|LR (default: TB)');
    console.log('  --title, -t             Title drawn above the diagram');
    console.log('  --no-shadow             Do not draw box shadows');
    console.log('  --rounded               Rounded box corners');
    console.log('  --compact               No blank padding rows inside boxes');
    console.log('  --max-text-width <n>    Wrap labels at n characters (default: 22)');
    console.log('  --min-box-width <n>     Minimum box width (default: 10)');
    console.log('  --horizontal-spacing <n>  Cells between boxes horizontally (default: 12)');
    console.log('  --vertical-spacing <n>    Cells between boxes vertically (default: 3)');
    console.log('  --engine <name>         Layout engine: layered|dagre (default: layered)');
    console.log('  --config <file.json>    Read options from a JSON file; flags win');
    console.log('  --format, -f            Output format: text|svg|dot (default: from extension or text)');
    console.log('  --output, -o            Output file path (alternative to positional argument)');
    console.log('  --trace                 Print a summary of canvas writes to stderr');
}

function readInput(arg: string): { content: string; filename: string } {
    if (arg === '-') {
        return { content: fs.readFileSync(0, 'utf8'), filename: '<stdin>' };
    }
    if (!fs.existsSync(arg)) {
        console.error(`File not found: ${arg}`);
        process.exit(1);
    }
    return { content: fs.readFileSync(arg, 'utf8'), filename: arg };
}

function isDirectory(p: string) {
    try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

const DEFAULT_INCLUDE_GLOBS = [
    '**/*.flow',
    '**/*.gridflow',
    '**/*.md',
    '**/*.markdown',
];

const DEFAULT_IGNORE_DIRS = [
    '**/.git/**',
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/coverage/**'
];

async function listCandidateFiles(root: string, includes: string[], excludes: string[], useGitignore: boolean): Promise<string[]> {
    const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
    const ignore = [
        ...excludes,
        ...(useGitignore ? [] : DEFAULT_IGNORE_DIRS),
    ];
    const files = await globby(patterns, {
        cwd: path.resolve(root),
        absolute: true,
        dot: true,
        gitignore: useGitignore,
        ignore,
        followSymbolicLinks: false,
    });
    return files.sort();
}

function loadConfig(file: string): unknown {
    let raw: string;
    try {
        raw = fs.readFileSync(file, 'utf8');
    } catch (err) {
        throw new UsageError(`Cannot read config ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
    try {
        return JSON.parse(raw);
    } catch (err) {
        throw new UsageError(`Config ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
}

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function pickRenderer(format: RenderArgs['format']): IRenderer {
    switch (format) {
        case 'svg': return new SvgRenderer();
        case 'dot': return new DotRenderer();
        default: return new TextRenderer();
    }
}

async function handleRenderCommand(args: string[]) {
    const parsed = parseRenderArgs(args);
    if (!parsed.input) throw new UsageError('No input file specified');

    const fileOptions = parsed.configPath ? loadConfig(parsed.configPath) : {};
    if (!isRecord(fileOptions)) throw new UsageError(`Config ${parsed.configPath} must contain a JSON object`);
    const options = resolveOptions({ ...fileOptions, ...parsed.options });

    const trace = parsed.trace ? new TraceRecorder() : undefined;
    const config = {
        layoutEngine: parsed.engine === 'dagre' ? new DagreLayoutEngine() : new LayeredLayoutEngine({ sweeps: options.sweeps }),
        renderer: pickRenderer(parsed.format),
        observer: trace,
    };
    const generator = new FlowchartGenerator(options, config);

    const { content, filename } = readInput(parsed.input);
    const sources = flowSources(content, filename);
    if (sources.length === 0) {
        console.error(`No flowcharts found in ${filename}`);
        process.exit(1);
    }

    const outputs: string[] = [];
    const errors: ValidationError[] = [];
    for (const src of sources) {
        try {
            // Fence settings override the command line for their own block.
            const blockGenerator = Object.keys(src.settings).length > 0
                ? new FlowchartGenerator({ ...options, ...src.settings }, config)
                : generator;
            outputs.push(blockGenerator.generate(src.content).output);
        } catch (err) {
            if (!(err instanceof GridflowError)) throw err;
            const diags = err instanceof ParseError ? err.errors : [];
            if (diags.length > 0) errors.push(...offsetErrors(diags, src.lineOffset));
            else errors.push({ line: src.lineOffset + 1, column: 1, severity: 'error', code: err.code, message: err.message });
        }
    }
    if (errors.length > 0) {
        console.error(textReport(filename, content, errors).trimEnd());
        process.exit(1);
    }

    const result = outputs.join('\n\n') + '\n';
    if (parsed.output) {
        fs.writeFileSync(parsed.output, result, 'utf8');
        console.log(`Rendered ${sources.length} flowchart(s) to ${parsed.output}`);
    } else {
        process.stdout.write(result);
    }
    if (trace) console.error(trace.summary());
}

async function handleCheckCommand(args: string[]) {
    let format: 'text' | 'json' = 'text';
    const includeGlobs: string[] = [];
    const excludeGlobs: string[] = [];
    let useGitignore = true;
    const positionals: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (a === '--format' || a === '-f') {
            const v = (args[i + 1] || '').toLowerCase();
            if (v === 'json' || v === 'text') { format = v; i++; continue; }
            throw new UsageError(`Unknown format '${v}'. Use text or json.`);
        }
        if (a === '--include' || a === '-I') {
            const v = args[i + 1];
            if (v) { includeGlobs.push(...splitGlobs(v)); i++; continue; }
        }
        if (a === '--exclude' || a === '-E') {
            const v = args[i + 1];
            if (v) { excludeGlobs.push(...splitGlobs(v)); i++; continue; }
        }
        if (a === '--no-gitignore') { useGitignore = false; continue; }
        if (a === '--gitignore') { useGitignore = true; continue; }
        if (a === '-' || !a.startsWith('-')) positionals.push(a);
    }
    const target = positionals[0];
    if (!target) throw new UsageError('No input file specified');

    // Directory mode
    if (isDirectory(target)) {
        const files = await listCandidateFiles(target, includeGlobs, excludeGlobs, useGitignore);
        type FileResult = { file: string; content: string; errors: ValidationError[] };
        const results: FileResult[] = [];
        let diagramCount = 0;
        for (const file of files) {
            const content = fs.readFileSync(file, 'utf8');
            const res = validateDocument(content, file);
            diagramCount += res.diagramCount;
            results.push({ file, content, errors: res.errors });
        }
        const failing = results.filter(r => r.errors.some(e => e.severity === 'error'));
        if (format === 'json') {
            const jsonFiles = results.map(r => toJsonResult(r.file, r.errors));
            const errorCount = jsonFiles.reduce((n, jf) => n + jf.errorCount, 0);
            const warningCount = jsonFiles.reduce((n, jf) => n + jf.warningCount, 0);
            const payload = { valid: errorCount === 0, files: jsonFiles, errorCount, warningCount, diagramCount };
            console.log(JSON.stringify(payload, null, 2));
            process.exit(errorCount === 0 ? 0 : 1);
        }
        if (failing.length === 0) {
            console.log(diagramCount === 0 ? 'No flowcharts found.' : 'All flowcharts valid.');
            process.exit(0);
        }
        for (const r of failing) console.error(textReport(r.file, r.content, r.errors).trimEnd());
        process.exit(1);
    }

    // Single-file or stdin mode
    const { content, filename } = readInput(target);
    const { errors, diagramCount } = validateDocument(content, filename);
    const errorCount = errors.filter(e => e.severity === 'error').length;

    if (format === 'json') {
        console.log(JSON.stringify({ ...toJsonResult(filename, errors), diagramCount }, null, 2));
        process.exit(errorCount > 0 ? 1 : 0);
    }
    if (diagramCount === 0) {
        console.log('No flowcharts found.');
    } else {
        const report = textReport(filename, content, errors);
        if (errorCount > 0) console.error(report); else console.log(report);
    }
    process.exit(errorCount > 0 ? 1 : 0);
}

async function main() {
    const args = process.argv.slice(2);

    if (args[0] === 'render') {
        const renderArgs = args.slice(1);
        if (renderArgs.length === 0 || renderArgs[0] === '--help' || renderArgs[0] === '-h') {
            printRenderUsage();
            process.exit(renderArgs.length === 0 ? 1 : 0);
        }
        await handleRenderCommand(renderArgs);
        return;
    }

    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    await handleCheckCommand(args[0] === 'check' ? args.slice(1) : args);
}

main().catch((err) => {
    if (err instanceof UsageError || err instanceof GridflowError) {
        console.error(`Error: ${err.message}`);
    } else {
        console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    }
    process.exit(1);
});
