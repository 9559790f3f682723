/**
 * Parameter registry.
 *
 * Static tables mirroring the part/pattern definitions of the Volca Sample
 * pattern format: knob slots, motion lanes, function bits and value ranges.
 */
import { UnknownFunctionError, UnknownParameterError } from '../util/errors.js';

export const PARAM_NAMES = [
  'level',
  'pan',
  'speed',
  'amp_attack',
  'amp_decay',
  'pitch_int',
  'pitch_attack',
  'pitch_decay',
  'start_point',
  'length',
  'hi_cut',
] as const;

export type ParamName = typeof PARAM_NAMES[number];

export const FUNCTION_NAMES = ['motion', 'loop', 'reverb', 'reverse', 'mute'] as const;

export type FunctionName = typeof FUNCTION_NAMES[number];

/** Parameters whose motion data is a start/end pair. */
export type TwoLaneParam = 'level' | 'pan' | 'speed';

export const NUM_PATTERNS = 10;
export const NUM_PARTS = 10;
export const NUM_STEPS = 16;
export const NUM_PARAMS = PARAM_NAMES.length;
export const NUM_MOTION_LANES = 14;
export const MOTION_SLOTS = NUM_MOTION_LANES * NUM_STEPS; // 224

export const SAMPLE_MIN = 0;
export const SAMPLE_MAX = 99;

export const MOTION_MIN = 1;
export const MOTION_MAX = 127;
// Motion bytes above 0x80 mark "override the knob at this step".
export const MOTION_BIAS = 128;

const PARAM_INDEX: Record<ParamName, number> = {
  level: 0,
  pan: 1,
  speed: 2,
  amp_attack: 3,
  amp_decay: 4,
  pitch_int: 5,
  pitch_attack: 6,
  pitch_decay: 7,
  start_point: 8,
  length: 9,
  hi_cut: 10,
};

const MOTION_LANE: Record<ParamName, number> = {
  level: 0,
  pan: 2,
  speed: 4,
  amp_attack: 6,
  amp_decay: 7,
  pitch_int: 8,
  pitch_attack: 9,
  pitch_decay: 10,
  start_point: 11,
  length: 12,
  hi_cut: 13,
};

const FUNCTION_BIT: Record<FunctionName, number> = {
  motion: 0x01,
  loop: 0x02,
  reverb: 0x04,
  reverse: 0x08,
  mute: 0x10,
};

export interface Range {
  min: number;
  max: number;
}

const KNOB_RANGE: Record<ParamName, Range> = {
  level: { min: 0, max: 127 },
  pan: { min: 1, max: 127 },
  speed: { min: 40, max: 88 },
  amp_attack: { min: 0, max: 127 },
  amp_decay: { min: 0, max: 127 },
  pitch_int: { min: 1, max: 127 },
  pitch_attack: { min: 0, max: 127 },
  pitch_decay: { min: 0, max: 127 },
  start_point: { min: 0, max: 127 },
  length: { min: 0, max: 127 },
  hi_cut: { min: 0, max: 127 },
};

const TWO_LANE_PARAMS: ReadonlySet<ParamName> = new Set<TwoLaneParam>(['level', 'pan', 'speed']);

export const DEFAULT_PARAMS: readonly number[] = Object.freeze([127, 64, 64, 0, 127, 64, 0, 127, 0, 127, 127]);

export function isParamName(name: string): name is ParamName {
  return Object.prototype.hasOwnProperty.call(PARAM_INDEX, name);
}

export function isFunctionName(name: string): name is FunctionName {
  return Object.prototype.hasOwnProperty.call(FUNCTION_BIT, name);
}

export function paramIndexFor(name: string): number {
  if (!isParamName(name)) throw new UnknownParameterError(name);
  return PARAM_INDEX[name];
}

export function motionLaneFor(name: string): number {
  if (!isParamName(name)) throw new UnknownParameterError(name);
  return MOTION_LANE[name];
}

export function functionBitFor(name: string): number {
  if (!isFunctionName(name)) throw new UnknownFunctionError(name);
  return FUNCTION_BIT[name];
}

export function knobRangeFor(param: ParamName): Range {
  return KNOB_RANGE[param];
}

export function isTwoLane(param: ParamName): param is TwoLaneParam {
  return TWO_LANE_PARAMS.has(param);
}

/** `speed` motion values are stored as-is; everything else is biased. */
export function motionBiasFor(param: ParamName): number {
  return param === 'speed' ? 0 : MOTION_BIAS;
}

/**
 * Index into the 224-entry motion buffer for a 1-based step.
 * `laneOffset` selects the end lane (1) of a two-lane parameter.
 */
export function motionSlot(param: ParamName, step: number, laneOffset: 0 | 1 = 0): number {
  return (MOTION_LANE[param] + laneOffset) * NUM_STEPS + (step - 1);
}
