import { createToken, Lexer } from 'chevrotain';

// Whole-line comments only: a '#' inside a node name is part of the name.
export const Comment = createToken({ name: 'Comment', pattern: /#[^\n\r]*/, group: Lexer.SKIPPED });
// `[GROUP NAME: member member ...]`
export const GroupLine = createToken({ name: 'GroupLine', pattern: /\[[^\]\n\r:]*:[^\]\n\r]*\]/ });
export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });
export const Arrow = createToken({ name: 'Arrow', pattern: /->/ });
// Everything up to the next arrow or line break; trailing blanks are trimmed by the semantics pass.
export const NodeText = createToken({ name: 'NodeText', pattern: /(?:[^\-\r\n]|-(?!>))+/ });
export const Newline = createToken({ name: 'Newline', pattern: /\r\n|\r|\n/, line_breaks: true });

export const allTokens = [
  Comment,
  GroupLine,
  // whitespace before NodeText so names never start with a blank
  WhiteSpace,
  Arrow,
  NodeText,
  Newline,
];

export const FlowLexer = new Lexer(allTokens);

export function tokenize(text: string) {
  return FlowLexer.tokenize(text);
}
