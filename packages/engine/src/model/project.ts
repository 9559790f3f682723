/**
 * Ten patterns of ten parts each, with per-pattern modification counters.
 *
 * Parts can be addressed two ways:
 * - explicitly, through `project.part(pattern, part)` which returns a
 *   `PartEditor` bound to that address;
 * - through the cursor: `selectPattern` / `selectPart` followed by the
 *   mutators and accessors on the project itself.
 *
 * The project is plain in-process state. Select-then-mutate on the cursor is
 * two calls; callers sharing a project must guard both as one unit.
 */
import { NUM_PARTS, NUM_PATTERNS, TwoLaneParam, FunctionName } from '../params/registry.js';
import { Rng, defaultRng } from '../params/random.js';
import { resolveSelector } from '../params/validate.js';
import { ValueInput } from '../params/value.js';
import { MotionPair, MotionReading, MotionValues, ParamValues, PartEditor, StepFlag } from './partEditor.js';
import { Pattern } from './pattern.js';

export interface ProjectOptions {
  /** Random source for 'random' values; defaults to Math.random. */
  rng?: Rng;
}

export class Project {
  readonly patterns: readonly Pattern[];
  private readonly modified: number[] = new Array<number>(NUM_PATTERNS).fill(0);
  private readonly rng: Rng;
  private patternIdx = 0;
  private partIdx = 0;

  constructor(opts: ProjectOptions = {}) {
    this.rng = opts.rng ?? defaultRng;
    const patterns: Pattern[] = [];
    for (let i = 0; i < NUM_PATTERNS; i++) patterns.push(new Pattern());
    this.patterns = patterns;
  }

  // ---------- Addressing ----------

  /** Editor for the part at a 1-based pattern/part address. */
  part(patternNo: number, partNo: number): PartEditor {
    const pattern = resolveSelector('pattern number', patternNo, 1, NUM_PATTERNS);
    const part = resolveSelector('part number', partNo, 1, NUM_PARTS);
    const idx = pattern - 1;
    return new PartEditor(
      { pattern, part },
      this.patterns[idx].parts[part - 1],
      () => { this.modified[idx]++; },
      this.rng,
    );
  }

  /** Editor for the part under the cursor. */
  current(): PartEditor {
    return this.part(this.patternIdx + 1, this.partIdx + 1);
  }

  patternAt(patternNo: number): Pattern {
    return this.patterns[resolveSelector('pattern number', patternNo, 1, NUM_PATTERNS) - 1];
  }

  // ---------- Cursor ----------

  selectPattern(patternNo: ValueInput): void {
    this.patternIdx = resolveSelector('pattern number', patternNo, 1, NUM_PATTERNS, this.rng) - 1;
  }

  selectPart(partNo: ValueInput): void {
    this.partIdx = resolveSelector('part number', partNo, 1, NUM_PARTS, this.rng) - 1;
  }

  getPattern(): number {
    return this.patternIdx + 1;
  }

  getPart(): number {
    return this.partIdx + 1;
  }

  // ---------- Cursor-addressed mutators ----------

  setSample(sample: ValueInput): void {
    this.current().setSample(sample);
  }

  setFunctions(...names: string[]): void {
    this.current().setFunctions(...names);
  }

  setStep(step: number): void {
    this.current().setStep(step);
  }

  setSteps(flags: readonly StepFlag[]): void {
    this.current().setSteps(flags);
  }

  setParams(values: ParamValues): void {
    this.current().setParams(values);
  }

  setMotionParams(step: number, values: MotionValues): void {
    this.current().setMotionParams(step, values);
  }

  // ---------- Cursor-addressed accessors ----------

  getSample(): number {
    return this.current().getSample();
  }

  stepIsOn(step: number): boolean {
    return this.current().stepIsOn(step);
  }

  functionIsOn(name: string): boolean {
    return this.current().functionIsOn(name);
  }

  getFunctions(): FunctionName[] {
    return this.current().getFunctions();
  }

  getParam(name: string): number {
    return this.current().getParam(name);
  }

  getMotionParam(step: number, name: TwoLaneParam): MotionPair;
  getMotionParam(step: number, name: string): MotionReading | MotionPair;
  getMotionParam(step: number, name: string): MotionReading | MotionPair {
    return this.current().getMotionParam(step, name);
  }

  getRawMotion(step: number, name: string): number[] {
    return this.current().getRawMotion(step, name);
  }

  // ---------- Modification tracking ----------

  /** 1-based numbers of patterns mutated at least once, ascending. */
  listModifiedPatterns(): number[] {
    const out: number[] = [];
    this.modified.forEach((count, i) => {
      if (count > 0) out.push(i + 1);
    });
    return out;
  }

  modificationCount(patternNo: number): number {
    return this.modified[resolveSelector('pattern number', patternNo, 1, NUM_PATTERNS) - 1];
  }
}
