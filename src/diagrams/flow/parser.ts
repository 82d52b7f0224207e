import { CstParser, type IToken } from 'chevrotain';
import * as t from './lexer.js';

export class FlowParser extends CstParser {
  constructor() {
    super(t.allTokens);
    this.performSelfAnalysis();
  }

  public diagram = this.RULE('diagram', () => {
    this.MANY(() => this.SUBRULE(this.statement));
  });

  private statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.groupStmt) },
      { ALT: () => this.SUBRULE(this.edgeStmt) },
      { ALT: () => this.CONSUME(t.Newline) },
    ]);
  });

  private groupStmt = this.RULE('groupStmt', () => {
    this.CONSUME(t.GroupLine);
    this.OPTION(() => this.CONSUME(t.Newline));
  });

  // A -> B, or a chain A -> B -> C
  private edgeStmt = this.RULE('edgeStmt', () => {
    this.CONSUME(t.NodeText);
    this.AT_LEAST_ONE(() => {
      this.CONSUME(t.Arrow);
      this.CONSUME2(t.NodeText);
    });
    this.OPTION(() => this.CONSUME(t.Newline));
  });
}

export const parserInstance = new FlowParser();

export function parse(tokens: IToken[]) {
  parserInstance.input = tokens;
  const cst = parserInstance.diagram();
  return { cst, errors: parserInstance.errors };
}
