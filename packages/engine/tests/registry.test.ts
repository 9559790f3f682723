import {
  DEFAULT_PARAMS,
  FUNCTION_NAMES,
  MOTION_SLOTS,
  NUM_PARAMS,
  PARAM_NAMES,
  functionBitFor,
  isFunctionName,
  isParamName,
  isTwoLane,
  knobRangeFor,
  motionBiasFor,
  motionLaneFor,
  motionSlot,
  paramIndexFor,
} from '../src/params/registry';
import { UnknownFunctionError, UnknownParameterError } from '../src/util/errors';

describe('parameter registry', () => {
  test('knob slots follow the part struct order', () => {
    expect(PARAM_NAMES.map(paramIndexFor)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(NUM_PARAMS).toBe(11);
    expect(DEFAULT_PARAMS).toHaveLength(NUM_PARAMS);
  });

  test('two-lane parameters occupy two motion lanes', () => {
    expect(motionLaneFor('level')).toBe(0);
    expect(motionLaneFor('pan')).toBe(2);
    expect(motionLaneFor('speed')).toBe(4);
    expect(motionLaneFor('amp_attack')).toBe(6);
    expect(motionLaneFor('hi_cut')).toBe(13);
    expect(PARAM_NAMES.filter(isTwoLane)).toEqual(['level', 'pan', 'speed']);
  });

  test('motion slots are lane * 16 + step - 1', () => {
    expect(motionSlot('level', 1)).toBe(0);
    expect(motionSlot('level', 16, 1)).toBe(31);
    expect(motionSlot('pan', 3)).toBe(34);
    expect(motionSlot('pan', 3, 1)).toBe(50);
    expect(motionSlot('hi_cut', 16)).toBe(MOTION_SLOTS - 1);
  });

  test('speed motion is stored without bias', () => {
    expect(motionBiasFor('speed')).toBe(0);
    expect(motionBiasFor('pan')).toBe(128);
    expect(motionBiasFor('length')).toBe(128);
  });

  test('function bits', () => {
    expect(FUNCTION_NAMES.map(functionBitFor)).toEqual([0x01, 0x02, 0x04, 0x08, 0x10]);
    expect(isFunctionName('reverb')).toBe(true);
    expect(isFunctionName('chorus')).toBe(false);
  });

  test('knob ranges', () => {
    expect(knobRangeFor('speed')).toEqual({ min: 40, max: 88 });
    expect(knobRangeFor('pan')).toEqual({ min: 1, max: 127 });
    expect(knobRangeFor('level')).toEqual({ min: 0, max: 127 });
  });

  test('unknown names throw typed errors', () => {
    expect(isParamName('volume')).toBe(false);
    expect(isParamName('toString')).toBe(false);
    expect(() => paramIndexFor('volume')).toThrow(UnknownParameterError);
    expect(() => motionLaneFor('volume')).toThrow("unrecognised parameter name 'volume'");
    expect(() => functionBitFor('chorus')).toThrow(UnknownFunctionError);
  });
});
