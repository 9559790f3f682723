/**
 * Bounds checking and random value resolution.
 *
 * Each `validate*` function throws on bad input; the `resolve*` variants
 * validate and then turn a `Value` into the number that gets stored, so no
 * caller ever writes an unresolved value.
 */
import {
  FunctionName,
  MOTION_MAX,
  MOTION_MIN,
  ParamName,
  SAMPLE_MAX,
  SAMPLE_MIN,
  isFunctionName,
  isParamName,
  isTwoLane,
  knobRangeFor,
  motionBiasFor,
} from './registry.js';
import { Rng, defaultRng, randomInt } from './random.js';
import { Value, ValueInput, formatValue, toValue } from './value.js';
import {
  InvalidSelectorError,
  MalformedMotionInputError,
  OutOfRangeError,
  UnknownFunctionError,
  UnknownParameterError,
} from '../util/errors.js';

function isWhole(n: number): boolean {
  return Number.isInteger(n);
}

export function validateSelector(label: string, value: Value, min: number, max: number): void {
  if (value.kind === 'random') return;
  if (!isWhole(value.value) || value.value < min || value.value > max) {
    throw new InvalidSelectorError(`${label} ${formatValue(value)} is out of bounds (should be between ${min} & ${max})`);
  }
}

export function resolveSelector(label: string, input: ValueInput, min: number, max: number, rng: Rng = defaultRng): number {
  const value = toValue(input);
  validateSelector(label, value, min, max);
  return value.kind === 'random' ? randomInt(min, max, rng) : value.value;
}

export function validateSample(value: Value): void {
  if (value.kind === 'random') return;
  if (!isWhole(value.value) || value.value < SAMPLE_MIN || value.value > SAMPLE_MAX) {
    throw new OutOfRangeError(
      `sample number ${formatValue(value)} is out of range (should be between ${SAMPLE_MIN} & ${SAMPLE_MAX})`,
    );
  }
}

export function resolveSample(input: ValueInput, rng: Rng = defaultRng): number {
  const value = toValue(input);
  validateSample(value);
  return value.kind === 'random' ? randomInt(SAMPLE_MIN, SAMPLE_MAX, rng) : value.value;
}

export function validateParamName(name: string): ParamName {
  if (!isParamName(name)) throw new UnknownParameterError(name);
  return name;
}

export function validateFunctionName(name: string): FunctionName {
  if (!isFunctionName(name)) throw new UnknownFunctionError(name);
  return name;
}

export function validateKnobValue(param: ParamName, value: Value): void {
  if (value.kind === 'random') return;
  const { min, max } = knobRangeFor(param);
  if (!isWhole(value.value) || value.value < min || value.value > max) {
    throw new OutOfRangeError(
      `'${param}' parameter value ${value.value} is out of range (should be between ${min} & ${max})`,
    );
  }
}

export function resolveRandomKnob(param: ParamName, rng: Rng = defaultRng): number {
  const { min, max } = knobRangeFor(param);
  return randomInt(min, max, rng);
}

export function resolveKnobValue(param: ParamName, input: ValueInput, rng: Rng = defaultRng): number {
  const value = toValue(input);
  validateKnobValue(param, value);
  return value.kind === 'random' ? resolveRandomKnob(param, rng) : value.value;
}

/**
 * Checks the value list for one motion parameter at one step.
 * Two-lane parameters (level, pan, speed) take a start and an end value;
 * the others take a single value.
 */
export function validateMotionValue(param: ParamName, values: readonly Value[]): void {
  if (values.length === 0) {
    throw new MalformedMotionInputError(`no motion parameter values given for '${param}'`);
  }
  if (values.length > 2) {
    throw new MalformedMotionInputError(`'${param}' motion parameter takes at most 2 values, got ${values.length}`);
  }
  if (isTwoLane(param) && values.length < 2) {
    throw new MalformedMotionInputError(`'${param}' motion parameter should have 2 values`);
  }
  if (!isTwoLane(param) && values.length > 1) {
    throw new MalformedMotionInputError(`'${param}' motion parameter should have 1 value`);
  }
  for (const v of values) {
    if (v.kind === 'random') continue;
    if (!isWhole(v.value) || v.value < MOTION_MIN || v.value > MOTION_MAX) {
      throw new OutOfRangeError(
        `'${param}' motion parameter value ${v.value} is out of range (should be between ${MOTION_MIN} & ${MOTION_MAX})`,
      );
    }
  }
}

/** Random motion byte, already biased for everything but `speed`. */
export function resolveRandomMotion(param: ParamName, rng: Rng = defaultRng): number {
  return randomInt(MOTION_MIN, MOTION_MAX, rng) + motionBiasFor(param);
}

/** Validates and returns the stored (biased) bytes for one step. */
export function resolveMotionValues(param: ParamName, inputs: readonly ValueInput[], rng: Rng = defaultRng): number[] {
  const values = inputs.map(toValue);
  validateMotionValue(param, values);
  return values.map(v => (v.kind === 'random' ? resolveRandomMotion(param, rng) : v.value + motionBiasFor(param)));
}
