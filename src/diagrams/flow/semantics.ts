import type { CstNode, IToken } from 'chevrotain';
import { parserInstance } from './parser.js';
import type { Connection, GroupDefinition, ValidationError } from '../../core/types.js';

interface DiagramCtx { statement?: CstNode[] }
interface GroupStmtCtx { GroupLine: IToken[] }
interface EdgeStmtCtx { NodeText: IToken[]; Arrow?: IToken[] }

interface PendingGroup {
  token: IToken;
  name: string;
  memberText: string;
}

export interface FlowAnalysis {
  connections: Connection[];
  groups: GroupDefinition[];
}

const GROUP_RE = /^\[([^:]*):(.*)\]$/;

const BaseVisitor = parserInstance.getBaseCstVisitorConstructorWithDefaults();

class FlowSemanticsVisitor extends BaseVisitor {
  readonly connections: Connection[] = [];
  readonly pending: PendingGroup[] = [];
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[]) {
    super();
    this.validateVisitor();
    this.errors = errors;
  }

  diagram(ctx: DiagramCtx) {
    for (const s of ctx.statement ?? []) this.visit(s);
  }

  groupStmt(ctx: GroupStmtCtx) {
    const tok = ctx.GroupLine[0];
    if (this.connections.length > 0) {
      this.errors.push({
        line: tok.startLine ?? 1,
        column: tok.startColumn ?? 1,
        severity: 'error',
        code: 'FL-GROUP-AFTER-EDGES',
        message: 'Group definitions must appear before the first connection.',
        hint: 'Move every [NAME: members] line to the top of the input.',
        length: tok.image.length,
      });
      return;
    }
    const m = GROUP_RE.exec(tok.image);
    this.pending.push({ token: tok, name: (m?.[1] ?? '').trim(), memberText: (m?.[2] ?? '').trim() });
  }

  edgeStmt(ctx: EdgeStmtCtx) {
    const names = ctx.NodeText;
    for (let i = 0; i + 1 < names.length; i++) {
      const source = names[i].image.trim();
      const target = names[i + 1].image.trim();
      if (!source) {
        this.errors.push(emptyName('FL-EDGE-EMPTY-SOURCE', names[i], 'Empty source node.'));
        continue;
      }
      if (!target) {
        this.errors.push(emptyName('FL-EDGE-EMPTY-TARGET', names[i + 1], 'Empty target node.'));
        continue;
      }
      this.connections.push([source, target]);
    }
  }
}

function emptyName(code: 'FL-EDGE-EMPTY-SOURCE' | 'FL-EDGE-EMPTY-TARGET', tok: IToken, message: string): ValidationError {
  return {
    line: tok.startLine ?? 1,
    column: tok.startColumn ?? 1,
    severity: 'error',
    code,
    message,
    hint: 'Example: A -> B',
    length: Math.max(1, tok.image.length),
  };
}

/** Unique node names in order of first appearance. */
export function nodeNames(connections: readonly Connection[]): string[] {
  const seen = new Set<string>();
  for (const [s, t] of connections) {
    seen.add(s);
    seen.add(t);
  }
  return [...seen];
}

/**
 * Split a group's member text into known node names. Longer names win so
 * multi-word names are matched whole; words that match no node are skipped.
 */
export function matchMembers(memberText: string, known: readonly string[]): string[] {
  const byLength = [...known].sort((a, b) => b.length - a.length);
  const members: string[] = [];
  let rest = memberText.trim();
  while (rest) {
    const hit = byLength.find((n) => rest.startsWith(n) && (rest.length === n.length || /\s/.test(rest[n.length])));
    if (hit) {
      if (!members.includes(hit)) members.push(hit);
      rest = rest.slice(hit.length).trimStart();
      continue;
    }
    const space = rest.search(/\s/);
    if (space === -1) break;
    rest = rest.slice(space).trimStart();
  }
  return members;
}

function resolveGroups(pending: PendingGroup[], connections: Connection[], errors: ValidationError[]): GroupDefinition[] {
  const known = nodeNames(connections);
  const owner = new Map<string, string>();
  const groups: GroupDefinition[] = [];
  for (const g of pending) {
    const at = { line: g.token.startLine ?? 1, column: g.token.startColumn ?? 1, length: g.token.image.length };
    if (!g.name) {
      errors.push({ ...at, severity: 'error', code: 'FL-GROUP-EMPTY-NAME', message: 'Empty group name.', hint: 'Example: [BACKEND: api db]' });
      continue;
    }
    const members = g.memberText ? matchMembers(g.memberText, known) : [];
    if (members.length === 0) {
      errors.push({
        ...at,
        severity: 'error',
        code: 'FL-GROUP-NO-MEMBERS',
        message: g.memberText
          ? `No known node names found in members of group '${g.name}'.`
          : `Empty member list for group '${g.name}'.`,
        hint: 'Members must be node names used in a connection.',
      });
      continue;
    }
    let ok = true;
    for (const m of members) {
      const prev = owner.get(m);
      if (prev !== undefined) {
        errors.push({
          ...at,
          severity: 'error',
          code: 'FL-GROUP-DUPLICATE-MEMBER',
          message: `Node '${m}' already belongs to group '${prev}'.`,
        });
        ok = false;
        continue;
      }
      owner.set(m, g.name);
    }
    if (ok) groups.push({ name: g.name, members, order: groups.length, line: at.line });
  }
  return groups;
}

export function analyzeFlow(cst: CstNode, _tokens: IToken[]): { value: FlowAnalysis; errors: ValidationError[] } {
  const errors: ValidationError[] = [];
  const v = new FlowSemanticsVisitor(errors);
  v.visit(cst);
  const hasEdgeErrors = errors.some((e) => e.code === 'FL-EDGE-EMPTY-SOURCE' || e.code === 'FL-EDGE-EMPTY-TARGET');
  if (v.connections.length === 0 && !hasEdgeErrors) {
    errors.push({
      line: 1,
      column: 1,
      severity: 'error',
      code: 'FL-NO-EDGES',
      message: 'No connections found in input.',
      hint: 'Add at least one line like: A -> B',
    });
  }
  const groups = resolveGroups(v.pending, v.connections, errors);
  return { value: { connections: v.connections, groups }, errors };
}
