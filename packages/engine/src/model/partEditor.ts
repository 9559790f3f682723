/**
 * Mutators and accessors for a single addressed part.
 *
 * Every mutator validates all of its input before touching the part, so a
 * rejected call leaves the part exactly as it was. A successful mutator call
 * reports itself once through `onChange`, which the owning project uses to
 * count modifications per pattern.
 */
import {
  FunctionName,
  NUM_STEPS,
  ParamName,
  TwoLaneParam,
  isTwoLane,
  motionBiasFor,
  motionSlot,
  paramIndexFor,
} from '../params/registry.js';
import { Rng, defaultRng } from '../params/random.js';
import {
  resolveKnobValue,
  resolveMotionValues,
  resolveSample,
  resolveSelector,
  validateFunctionName,
  validateParamName,
} from '../params/validate.js';
import { ValueInput } from '../params/value.js';
import { InvalidSelectorError, MissingArgumentError, OutOfRangeError } from '../util/errors.js';
import { Part } from './part.js';

export type StepFlag = 0 | 1 | boolean;

export type ParamValues = Readonly<Record<string, ValueInput>>;

export type MotionValues = Readonly<Record<string, readonly ValueInput[]>>;

/** Logical motion value: bias removed, `null` where no motion is recorded. */
export type MotionReading = number | null;

export type MotionPair = readonly [start: MotionReading, end: MotionReading];

export interface PartAddress {
  /** 1-based pattern number */
  pattern: number;
  /** 1-based part number */
  part: number;
}

export class PartEditor {
  constructor(
    readonly address: Readonly<PartAddress>,
    private readonly target: Part,
    private readonly onChange: () => void = () => {},
    private readonly rng: Rng = defaultRng,
  ) {}

  get part(): Readonly<Part> {
    return this.target;
  }

  // ---------- Mutators ----------

  setSample(sample: ValueInput): void {
    this.target.sampleIndex = resolveSample(sample, this.rng);
    this.onChange();
  }

  setFunctions(...names: string[]): void {
    if (names.length === 0) throw new MissingArgumentError('setFunctions needs at least one function name');
    const funcs = names.map(validateFunctionName);
    for (const f of funcs) this.target.functions.add(f);
    this.onChange();
  }

  setStep(step: number): void {
    const s = checkStep(step);
    this.target.stepMask |= 1 << (s - 1);
    this.onChange();
  }

  /**
   * Turns on every step whose flag is 1. A 0 flag leaves the step as it is;
   * steps past the end of `flags` are untouched too. An empty list is a no-op.
   */
  setSteps(flags: readonly StepFlag[]): void {
    if (flags.length > NUM_STEPS) {
      throw new InvalidSelectorError(`at most ${NUM_STEPS} step flags can be given, got ${flags.length}`);
    }
    flags.forEach((flag, i) => {
      if (flag !== 0 && flag !== 1 && typeof flag !== 'boolean') {
        throw new OutOfRangeError(`step flag ${i + 1} must be 0 or 1, got ${String(flag)}`);
      }
    });
    if (flags.length === 0) return;

    let mask = this.target.stepMask;
    flags.forEach((flag, i) => {
      if (flag) mask |= 1 << i;
    });
    this.target.stepMask = mask;
    this.onChange();
  }

  setParams(values: ParamValues): void {
    requireEntries('setParams', values);
    const writes: Array<[index: number, value: number]> = [];
    for (const [name, input] of Object.entries(values)) {
      const param = validateParamName(name);
      writes.push([paramIndexFor(param), resolveKnobValue(param, input, this.rng)]);
    }
    for (const [index, value] of writes) this.target.setParam(index, value);
    this.onChange();
  }

  setMotionParams(step: number, values: MotionValues): void {
    const s = checkStep(step);
    requireEntries('setMotionParams', values);
    const writes: Array<[slot: number, value: number]> = [];
    for (const [name, inputs] of Object.entries(values)) {
      const param = validateParamName(name);
      const stored = resolveMotionValues(param, inputs, this.rng);
      writes.push([motionSlot(param, s), stored[0]]);
      if (isTwoLane(param)) writes.push([motionSlot(param, s, 1), stored[1]]);
    }
    for (const [slot, value] of writes) this.target.setMotion(slot, value);
    this.onChange();
  }

  // ---------- Accessors ----------

  getSample(): number {
    return this.target.sampleIndex;
  }

  stepIsOn(step: number): boolean {
    return this.target.stepIsOn(checkStep(step));
  }

  functionIsOn(name: string): boolean {
    return this.target.functions.has(validateFunctionName(name));
  }

  getFunctions(): FunctionName[] {
    return this.target.functions.toArray();
  }

  getParam(name: string): number {
    return this.target.params[paramIndexFor(validateParamName(name))];
  }

  getMotionParam(step: number, name: TwoLaneParam): MotionPair;
  getMotionParam(step: number, name: string): MotionReading | MotionPair;
  getMotionParam(step: number, name: string): MotionReading | MotionPair {
    const s = checkStep(step);
    const param = validateParamName(name);
    const read = (laneOffset: 0 | 1): MotionReading => toLogical(param, this.target.motion[motionSlot(param, s, laneOffset)]);
    if (isTwoLane(param)) return [read(0), read(1)];
    return read(0);
  }

  /** Stored motion bytes, bias included. */
  getRawMotion(step: number, name: string): number[] {
    const s = checkStep(step);
    const param = validateParamName(name);
    const slots = isTwoLane(param) ? [motionSlot(param, s), motionSlot(param, s, 1)] : [motionSlot(param, s)];
    return slots.map(slot => this.target.motion[slot]);
  }
}

function checkStep(step: number): number {
  return resolveSelector('step number', step, 1, NUM_STEPS);
}

function toLogical(param: ParamName, raw: number): MotionReading {
  return raw === 0 ? null : raw - motionBiasFor(param);
}

function requireEntries(setter: string, values: object): void {
  if (Object.keys(values).length === 0) {
    throw new MissingArgumentError(`${setter} needs at least one parameter`);
  }
}
