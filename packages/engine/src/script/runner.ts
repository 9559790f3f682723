import { Project } from '../model/project.js';
import { StepFlag } from '../model/partEditor.js';
import { Rng } from '../params/random.js';
import { Value } from '../params/value.js';
import { OutOfRangeError, ScriptError, SyroError } from '../util/errors.js';
import { createLogger } from '../util/logger.js';
import { Statement } from './ast.js';

const log = createLogger('script');

export interface RunOptions {
  /** Random source for a scratch project built by `checkScript`. */
  rng?: Rng;
}

function toStepFlag(flag: number, index: number): StepFlag {
  if (flag === 0 || flag === 1) return flag;
  throw new OutOfRangeError(`step flag ${index + 1} must be 0 or 1, got ${flag}`);
}

function apply(project: Project, stmt: Statement): void {
  switch (stmt.kind) {
    case 'pattern':
      project.selectPattern(stmt.value);
      break;
    case 'part':
      project.selectPart(stmt.value);
      break;
    case 'sample':
      project.setSample(stmt.value);
      break;
    case 'func':
      project.setFunctions(...stmt.names);
      break;
    case 'step':
      project.setStep(stmt.step);
      break;
    case 'steps':
      project.setSteps(stmt.flags.map(toStepFlag));
      break;
    case 'param': {
      const values = Object.fromEntries(stmt.assignments.map((a): [string, Value] => [a.name, a.value]));
      project.setParams(values);
      break;
    }
    case 'motion': {
      const values = Object.fromEntries(stmt.assignments.map((a): [string, Value[]] => [a.name, a.values]));
      project.setMotionParams(stmt.step, values);
      break;
    }
  }
}

/**
 * Apply one statement. Engine errors are rethrown as `ScriptError` carrying
 * the statement's position; anything else propagates unchanged.
 */
export function runStatement(project: Project, stmt: Statement): void {
  try {
    apply(project, stmt);
  } catch (err) {
    if (err instanceof SyroError) {
      throw new ScriptError(err.message, stmt.loc.line, stmt.loc.column, { cause: err });
    }
    throw err;
  }
}

/** Apply statements in order, stopping at the first failure. */
export function runScript(project: Project, statements: readonly Statement[]): Project {
  for (const stmt of statements) {
    log.debug(`line ${stmt.loc.line}: ${stmt.kind}`);
    runStatement(project, stmt);
  }
  return project;
}

/**
 * Run statements against a scratch project and collect every failure instead
 * of stopping at the first one.
 */
export function checkScript(statements: readonly Statement[], opts: RunOptions = {}): ScriptError[] {
  const project = new Project({ rng: opts.rng });
  const errors: ScriptError[] = [];
  for (const stmt of statements) {
    try {
      runStatement(project, stmt);
    } catch (err) {
      if (!(err instanceof ScriptError)) throw err;
      errors.push(err);
    }
  }
  return errors;
}
