/**
 * End-to-end generator tests
 *
 * - Full drawings for small graphs in both directions
 * - Titles, self-loops, error reporting
 * - Text, SVG and DOT output, write tracing
 */

import { describe, it, expect } from 'vitest';
import { FlowchartGenerator, generateFlowchart, renderFlow } from '../index.js';
import { DagreLayoutEngine } from '../dagre-layout.js';
import { SvgRenderer } from '../svg-renderer.js';
import { DotRenderer } from '../dot-renderer.js';
import { TraceRecorder } from '../trace.js';
import { EmptyGraphError, ParseError } from '../../core/errors.js';

const PLAIN = { shadow: false, compact: true };

describe('generateFlowchart', () => {
  it('draws two boxes and an arrow', () => {
    expect(generateFlowchart('A -> B')).toBe(
      [
        '┌────────┐',
        '│        │░',
        '│   A    │░',
        '│        │░',
        '└────┬───┘░',
        ' ░░░░│░░░░░',
        '     │',
        '     │',
        '     ▼',
        '┌────────┐',
        '│        │░',
        '│   B    │░',
        '│        │░',
        '└────────┘░',
        ' ░░░░░░░░░░',
      ].join('\n')
    );
  });

  it('draws left to right', () => {
    expect(generateFlowchart('A -> B', { ...PLAIN, direction: 'LR' })).toBe(
      [
        '┌────────┐            ┌────────┐',
        `│   A    ├${'─'.repeat(11)}►│   B    │`,
        '└────────┘            └────────┘',
      ].join('\n')
    );
  });

  it('routes a self-loop through the corridor', () => {
    expect(generateFlowchart('A -> A')).toBe(
      [
        '',
        ' ┌──────┐',
        ' │      ▼',
        ' │ ┌────────┐',
        ' │ │        │░',
        ' │ │   A    │░',
        ' │ │        │░',
        ' │ └────┬───┘░',
        ' │  ░░░░│░░░░░',
        ' │      │',
        ' └──────┘',
      ].join('\n')
    );
  });

  it('starts at the first row when no back edge returns to the top layer', () => {
    const { rows } = new FlowchartGenerator().generate('A -> B\nB -> C\nC -> B');
    expect(rows[0].trimEnd()).toBe('   ┌────────┐');
  });

  it('centres a title above the diagram', () => {
    const { rows } = new FlowchartGenerator({ title: 'Hi', shadow: false }).generate('A -> B');
    expect(rows).toHaveLength(18);
    expect(rows.slice(0, 5).map((r) => r.trimEnd())).toEqual(['  ╔════╗', '  ║ Hi ║', '  ╚════╝', '', '┌────────┐']);
  });

  it('centres the diagram under a wider title', () => {
    const { rows } = new FlowchartGenerator({ title: 'A long title here', shadow: false }).generate('A -> B');
    expect(rows[0]).toBe(`╔${'═'.repeat(19)}╗`);
    expect(rows[4].trimEnd()).toBe('     ┌────────┐');
  });

  it('accepts a connection list', () => {
    expect(generateFlowchart([['A', 'B']])).toBe(generateFlowchart('A -> B'));
  });

  it('gives the same drawing with the dagre engine on a chain', () => {
    const text = 'A -> B\nB -> C';
    expect(generateFlowchart(text, {}, { layoutEngine: new DagreLayoutEngine() })).toBe(generateFlowchart(text));
  });

  it('throws on invalid input', () => {
    expect(() => generateFlowchart('A B')).toThrow(ParseError);
    expect(() => generateFlowchart([['A', ' ']])).toThrow(ParseError);
    expect(() => generateFlowchart([])).toThrow(EmptyGraphError);
  });
});

describe('renderFlow', () => {
  it('returns diagnostics instead of throwing', () => {
    const res = renderFlow('A B');
    expect(res.output).toBe('');
    expect(res.errors.map((e) => e.code)).toEqual(['FL-EDGE-MISSING-ARROW']);
  });

  it('reports invalid options', () => {
    expect(renderFlow('A -> B', { maxTextWidth: 0 }).errors[0].code).toBe('GF-CONFIG');
  });

  it('reports canvases over the limit', () => {
    expect(renderFlow('A -> B', { maxCanvasCells: 10 }).errors[0].code).toBe('GF-CANVAS-TOO-LARGE');
  });

  it('returns the rows with the output', () => {
    const res = renderFlow('A -> B', PLAIN);
    expect(res.errors).toEqual([]);
    expect(res.rows).toHaveLength(10);
    expect(res.output.split('\n')).toHaveLength(9);
  });
});

describe('renderers', () => {
  it('writes one SVG text element per row', () => {
    const svg = generateFlowchart('A -> B', PLAIN, { renderer: new SvgRenderer() });
    const lines = svg.split('\n');
    expect(lines[0]).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="104" height="173" viewBox="0 0 104 173">');
    expect(lines[3]).toBe('    <text x="10" y="22.75" xml:space="preserve">┌────────┐</text>');
    expect(lines.filter((l) => l.includes('<text'))).toHaveLength(9);
    expect(lines[lines.length - 1]).toBe('</svg>');
  });

  it('escapes labels in SVG', () => {
    const svg = generateFlowchart('a<b -> c', PLAIN, { renderer: new SvgRenderer() });
    expect(svg).toContain('a&lt;b');
  });

  it('writes DOT with layers and dashed back edges', () => {
    const dot = generateFlowchart('A -> B\nB -> C\nC -> A', {}, { renderer: new DotRenderer() });
    expect(dot).toBe(
      [
        'digraph gridflow {',
        '  rankdir=TB;',
        '  node [shape=box];',
        '',
        '  { rank=same; "A"; }',
        '  { rank=same; "B"; }',
        '  { rank=same; "C"; }',
        '',
        '  "A" -> "B";',
        '  "B" -> "C";',
        '  "C" -> "A" [style=dashed];',
        '}',
      ].join('\n')
    );
  });

  it('quotes DOT labels and adds the title', () => {
    const dot = generateFlowchart('say "hi" -> B', { title: 'Flow' }, { renderer: new DotRenderer() });
    const lines = dot.split('\n');
    expect(lines[3]).toBe('  label="Flow";');
    expect(lines[4]).toBe('  labelloc=t;');
    expect(lines).toContain('  "say \\"hi\\"" -> "B";');
  });
});

describe('TraceRecorder', () => {
  it('counts writes by category and outcome', () => {
    const trace = new TraceRecorder();
    generateFlowchart('A -> B', {}, { observer: trace });
    expect(trace.summary()).toBe(
      ['writes: 87', '  border: 52', '  text: 2', '  shadow: 28', '  line: 4', '  arrow: 1', 'merged: 1', 'skipped: 0'].join('\n')
    );
  });

  it('shows how a cell was built', () => {
    const trace = new TraceRecorder();
    generateFlowchart('A -> B', {}, { observer: trace });
    expect(trace.at(5, 4).map((w) => [w.glyph, w.result, w.outcome, w.reason])).toEqual([
      ['─', '─', 'written', 'box A'],
      ['╷', '┬', 'merged', 'forward edge A -> B'],
    ]);
  });
});
