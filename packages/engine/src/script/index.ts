/**
 * Project scripts: a line-oriented text form of the project operations.
 *
 * ```
 * # kick on part 1 of pattern 1
 * pattern 1
 * part 1
 * sample 0
 * steps 1 0 0 0 1 0 0 0 1 0 0 0 1 0 0 0
 * param level=100 pan=random
 * func motion reverb
 * motion 1 pan=1,127 hi_cut=90
 * ```
 */
import { lex } from './lexer.js';
import { parseCst } from './parser.js';
import { transform } from './transformer.js';
import { ParseResult, ScriptDiagnostic } from './ast.js';

export function parseScript(src: string): ParseResult {
  const lexResult = lex(src);
  if (lexResult.errors.length) {
    const errors = lexResult.errors.map((e): ScriptDiagnostic => ({
      message: e.message,
      loc: { line: e.line ?? 0, column: e.column ?? 0 },
    }));
    return { statements: [], errors };
  }

  const { cst, errors } = parseCst(lexResult.tokens);
  if (!cst) {
    return {
      statements: [],
      errors: errors.map((e): ScriptDiagnostic => ({
        message: e.message,
        loc: { line: e.token.startLine ?? 0, column: e.token.startColumn ?? 0 },
      })),
    };
  }

  return { statements: transform(cst), errors: [] };
}

export { runScript, runStatement, checkScript, type RunOptions } from './runner.js';
export * from './ast.js';
