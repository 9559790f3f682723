import { Lexer, TokenType, createToken } from 'chevrotain';

// Identifiers double as the fallback for keywords: `partial` lexes as an
// Id, not as `part` followed by `ial`.
export const Id = createToken({ name: 'Id', pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

const keyword = (name: string, word: string): TokenType =>
  createToken({ name, pattern: new RegExp(word), longer_alt: Id });

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /[ \t]+/, group: Lexer.SKIPPED });
export const Comment = createToken({ name: 'Comment', pattern: /#[^\n]*/, group: Lexer.SKIPPED });
export const Newline = createToken({ name: 'Newline', pattern: /\r?\n/, line_breaks: true });

// statements
export const Pattern = keyword('Pattern', 'pattern');
export const Part = keyword('Part', 'part');
export const Sample = keyword('Sample', 'sample');
export const Func = keyword('Func', 'func');
// `steps` before `step` so the longer keyword wins
export const Steps = keyword('Steps', 'steps');
export const Step = keyword('Step', 'step');
export const Param = keyword('Param', 'param');
export const Motion = keyword('Motion', 'motion');

// values
export const Random = keyword('Random', 'random');
export const NumberLiteral = createToken({ name: 'NumberLiteral', pattern: /\d+/ });

// punctuation
export const Equals = createToken({ name: 'Equals', pattern: /=/ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });

export const allTokens: TokenType[] = [
  WhiteSpace,
  Comment,
  Newline,
  Pattern,
  Part,
  Sample,
  Func,
  Steps,
  Step,
  Param,
  Motion,
  Random,
  NumberLiteral,
  Equals,
  Comma,
  Id,
];
