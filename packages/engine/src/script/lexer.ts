import { ILexingResult, Lexer } from 'chevrotain';
import { allTokens } from './tokens.js';

let cached: Lexer | null = null;

function getLexer(): Lexer {
  if (!cached) cached = new Lexer(allTokens);
  return cached;
}

/**
 * Tokenize a script. A trailing newline is added so every statement,
 * including the last one, is terminated.
 */
export function lex(text: string): ILexingResult {
  const src = text.endsWith('\n') ? text : `${text}\n`;
  return getLexer().tokenize(src);
}
