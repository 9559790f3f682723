import { CstNode, CstParser, IRecognitionException, IToken } from 'chevrotain';
import {
  Comma,
  Equals,
  Func,
  Id,
  Motion,
  Newline,
  NumberLiteral,
  Param,
  Part,
  Pattern,
  Random,
  Sample,
  Step,
  Steps,
  allTokens,
} from './tokens.js';

/**
 * Grammar:
 *
 *   program    := line*
 *   line       := statement? Newline
 *   statement  := patternStmt | partStmt | sampleStmt | funcStmt
 *               | stepStmt | stepsStmt | paramStmt | motionStmt
 *   value      := NumberLiteral | 'random'
 *   funcStmt   := 'func' (Id | 'motion')+
 *   paramStmt  := 'param' (Id '=' value)+
 *   motionStmt := 'motion' NumberLiteral (Id '=' value (',' value)?)+
 */
class ScriptParser extends CstParser {
  constructor() {
    super(allTokens);
    this.performSelfAnalysis();
  }

  public program = this.RULE('program', () => {
    this.MANY(() => this.SUBRULE(this.line));
  });

  private line = this.RULE('line', () => {
    this.OPTION(() => this.SUBRULE(this.statement));
    this.CONSUME(Newline);
  });

  private statement = this.RULE('statement', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.patternStmt) },
      { ALT: () => this.SUBRULE(this.partStmt) },
      { ALT: () => this.SUBRULE(this.sampleStmt) },
      { ALT: () => this.SUBRULE(this.funcStmt) },
      { ALT: () => this.SUBRULE(this.stepStmt) },
      { ALT: () => this.SUBRULE(this.stepsStmt) },
      { ALT: () => this.SUBRULE(this.paramStmt) },
      { ALT: () => this.SUBRULE(this.motionStmt) },
    ]);
  });

  private value = this.RULE('value', () => {
    this.OR([
      { ALT: () => this.CONSUME(NumberLiteral) },
      { ALT: () => this.CONSUME(Random) },
    ]);
  });

  private patternStmt = this.RULE('patternStmt', () => {
    this.CONSUME(Pattern);
    this.SUBRULE(this.value);
  });

  private partStmt = this.RULE('partStmt', () => {
    this.CONSUME(Part);
    this.SUBRULE(this.value);
  });

  private sampleStmt = this.RULE('sampleStmt', () => {
    this.CONSUME(Sample);
    this.SUBRULE(this.value);
  });

  private funcStmt = this.RULE('funcStmt', () => {
    this.CONSUME(Func);
    this.AT_LEAST_ONE(() => {
      this.OR([
        { ALT: () => this.CONSUME(Id, { LABEL: 'name' }) },
        // `motion` is also a statement keyword
        { ALT: () => this.CONSUME(Motion, { LABEL: 'name' }) },
      ]);
    });
  });

  private stepStmt = this.RULE('stepStmt', () => {
    this.CONSUME(Step);
    this.CONSUME(NumberLiteral, { LABEL: 'step' });
  });

  private stepsStmt = this.RULE('stepsStmt', () => {
    this.CONSUME(Steps);
    this.AT_LEAST_ONE(() => this.CONSUME(NumberLiteral, { LABEL: 'flag' }));
  });

  private paramStmt = this.RULE('paramStmt', () => {
    this.CONSUME(Param);
    this.AT_LEAST_ONE(() => this.SUBRULE(this.paramAssign));
  });

  private paramAssign = this.RULE('paramAssign', () => {
    this.CONSUME(Id, { LABEL: 'name' });
    this.CONSUME(Equals);
    this.SUBRULE(this.value);
  });

  private motionStmt = this.RULE('motionStmt', () => {
    this.CONSUME(Motion);
    this.CONSUME(NumberLiteral, { LABEL: 'step' });
    this.AT_LEAST_ONE(() => this.SUBRULE(this.motionAssign));
  });

  private motionAssign = this.RULE('motionAssign', () => {
    this.CONSUME(Id, { LABEL: 'name' });
    this.CONSUME(Equals);
    this.SUBRULE(this.value, { LABEL: 'start' });
    this.OPTION(() => {
      this.CONSUME(Comma);
      this.SUBRULE2(this.value, { LABEL: 'end' });
    });
  });
}

let parser: ScriptParser | null = null;

export interface CstResult {
  cst: CstNode | null;
  errors: IRecognitionException[];
}

export function parseCst(tokens: IToken[]): CstResult {
  if (!parser) parser = new ScriptParser();
  parser.input = tokens;
  const cst = parser.program();
  if (parser.errors.length) return { cst: null, errors: parser.errors };
  return { cst, errors: [] };
}
