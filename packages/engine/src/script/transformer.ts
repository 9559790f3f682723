import { CstElement, CstNode, IToken } from 'chevrotain';
import { Value, fixed, random } from '../params/value.js';
import {
  MotionAssignment,
  ParamAssignment,
  SourceLoc,
  Statement,
} from './ast.js';

function isToken(el: CstElement): el is IToken {
  return 'image' in el;
}

function tokensOf(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter(isToken);
}

function nodesOf(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter((el): el is CstNode => !isToken(el));
}

function firstToken(node: CstNode, key: string): IToken {
  const tok = tokensOf(node, key)[0];
  if (!tok) throw new Error(`CST node '${node.name}' has no '${key}' token`);
  return tok;
}

function firstNode(node: CstNode, key: string): CstNode {
  const child = nodesOf(node, key)[0];
  if (!child) throw new Error(`CST node '${node.name}' has no '${key}' child`);
  return child;
}

function locOf(tok: IToken): SourceLoc {
  return { line: tok.startLine ?? 0, column: tok.startColumn ?? 0 };
}

function toValue(node: CstNode): Value {
  const num = tokensOf(node, 'NumberLiteral')[0];
  return num ? fixed(parseInt(num.image, 10)) : random();
}

function toNumber(tok: IToken): number {
  return parseInt(tok.image, 10);
}

function transformStatement(node: CstNode): Statement {
  const [key] = Object.keys(node.children);
  const stmt = firstNode(node, key);

  switch (stmt.name) {
    case 'patternStmt':
      return { kind: 'pattern', value: toValue(firstNode(stmt, 'value')), loc: locOf(firstToken(stmt, 'Pattern')) };
    case 'partStmt':
      return { kind: 'part', value: toValue(firstNode(stmt, 'value')), loc: locOf(firstToken(stmt, 'Part')) };
    case 'sampleStmt':
      return { kind: 'sample', value: toValue(firstNode(stmt, 'value')), loc: locOf(firstToken(stmt, 'Sample')) };
    case 'funcStmt':
      return { kind: 'func', names: tokensOf(stmt, 'name').map(t => t.image), loc: locOf(firstToken(stmt, 'Func')) };
    case 'stepStmt':
      return { kind: 'step', step: toNumber(firstToken(stmt, 'step')), loc: locOf(firstToken(stmt, 'Step')) };
    case 'stepsStmt':
      return { kind: 'steps', flags: tokensOf(stmt, 'flag').map(toNumber), loc: locOf(firstToken(stmt, 'Steps')) };
    case 'paramStmt': {
      const assignments = nodesOf(stmt, 'paramAssign').map((a): ParamAssignment => ({
        name: firstToken(a, 'name').image,
        value: toValue(firstNode(a, 'value')),
      }));
      return { kind: 'param', assignments, loc: locOf(firstToken(stmt, 'Param')) };
    }
    case 'motionStmt': {
      const assignments = nodesOf(stmt, 'motionAssign').map((a): MotionAssignment => ({
        name: firstToken(a, 'name').image,
        values: [...nodesOf(a, 'start'), ...nodesOf(a, 'end')].map(toValue),
      }));
      return {
        kind: 'motion',
        step: toNumber(firstToken(stmt, 'step')),
        assignments,
        loc: locOf(firstToken(stmt, 'Motion')),
      };
    }
    default:
      throw new Error(`unexpected statement node '${stmt.name}'`);
  }
}

/** Turn the `program` CST into a flat statement list. */
export function transform(cst: CstNode): Statement[] {
  const out: Statement[] = [];
  for (const line of nodesOf(cst, 'line')) {
    for (const stmt of nodesOf(line, 'statement')) out.push(transformStatement(stmt));
  }
  return out;
}
