import { Value } from '../params/value.js';

export interface SourceLoc {
  line: number;
  column: number;
}

export interface PatternStatement { kind: 'pattern'; value: Value; loc: SourceLoc }
export interface PartStatement { kind: 'part'; value: Value; loc: SourceLoc }
export interface SampleStatement { kind: 'sample'; value: Value; loc: SourceLoc }
export interface FuncStatement { kind: 'func'; names: string[]; loc: SourceLoc }
export interface StepStatement { kind: 'step'; step: number; loc: SourceLoc }
export interface StepsStatement { kind: 'steps'; flags: number[]; loc: SourceLoc }

export interface ParamAssignment {
  name: string;
  value: Value;
}

export interface ParamStatement { kind: 'param'; assignments: ParamAssignment[]; loc: SourceLoc }

export interface MotionAssignment {
  name: string;
  values: Value[];
}

export interface MotionStatement { kind: 'motion'; step: number; assignments: MotionAssignment[]; loc: SourceLoc }

export type Statement =
  | PatternStatement
  | PartStatement
  | SampleStatement
  | FuncStatement
  | StepStatement
  | StepsStatement
  | ParamStatement
  | MotionStatement;

export interface ScriptDiagnostic {
  message: string;
  loc: SourceLoc;
}

export interface ParseResult {
  statements: Statement[];
  errors: ScriptDiagnostic[];
}
