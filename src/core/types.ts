export interface ValidationError {
  line: number;
  column: number;
  message: string;
  severity: 'error' | 'warning';
  code?: string;
  hint?: string;
  length?: number;
}

export type DiagnosticCode =
  | 'FL-LEX'
  | 'FL-PARSE'
  | 'FL-EDGE-MISSING-ARROW'
  | 'FL-EDGE-EMPTY-SOURCE'
  | 'FL-EDGE-EMPTY-TARGET'
  | 'FL-GROUP-AFTER-EDGES'
  | 'FL-GROUP-EMPTY-NAME'
  | 'FL-GROUP-NO-MEMBERS'
  | 'FL-GROUP-DUPLICATE-MEMBER'
  | 'FL-NO-EDGES'
  | 'GF-EMPTY-GRAPH'
  | 'GF-CANVAS-TOO-LARGE'
  | 'GF-CONFIG'
  | 'GF-FENCE-SETTING'
  | 'GF-PARSE'
  | 'GF-RENDER';

/** A (source, target) pair as written in the input, identifiers already trimmed. */
export type Connection = readonly [source: string, target: string];

export interface GroupDefinition {
  name: string;
  members: string[];
  /** Zero-based position among the group lines. */
  order: number;
  line: number;
}

export interface ParseResult {
  connections: Connection[];
  groups: GroupDefinition[];
  errors: ValidationError[];
}
