import { createSeededRng, randomInt } from '../src/params/random';
import {
  resolveKnobValue,
  resolveMotionValues,
  resolveSample,
  resolveSelector,
  validateMotionValue,
} from '../src/params/validate';
import { fixed, random, toValue, formatValue } from '../src/params/value';
import {
  InvalidSelectorError,
  MalformedMotionInputError,
  OutOfRangeError,
} from '../src/util/errors';

describe('random values', () => {
  test('randomInt is inclusive at both ends', () => {
    expect(randomInt(1, 10, () => 0)).toBe(1);
    expect(randomInt(1, 10, () => 0.9999)).toBe(10);
    expect(randomInt(40, 88, () => 0.5)).toBe(64);
  });

  test('seeded generator is deterministic and stays in [0, 1)', () => {
    const a = createSeededRng(42);
    const b = createSeededRng(42);
    for (let i = 0; i < 100; i++) {
      const x = a();
      expect(x).toBe(b());
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  test('seed zero still produces values', () => {
    const rng = createSeededRng(0);
    expect(rng()).not.toBe(0);
  });

  test('value helpers', () => {
    expect(toValue(5)).toEqual({ kind: 'fixed', value: 5 });
    expect(toValue('random')).toEqual({ kind: 'random' });
    expect(toValue(fixed(3))).toEqual(fixed(3));
    expect(formatValue(random())).toBe('random');
    expect(formatValue(fixed(12))).toBe('12');
  });
});

describe('selectors', () => {
  test('accepts bounds and rejects outside them', () => {
    expect(resolveSelector('pattern number', 1, 1, 10)).toBe(1);
    expect(resolveSelector('pattern number', 10, 1, 10)).toBe(10);
    expect(() => resolveSelector('pattern number', 0, 1, 10)).toThrow(InvalidSelectorError);
    expect(() => resolveSelector('pattern number', 11, 1, 10)).toThrow(
      'pattern number 11 is out of bounds (should be between 1 & 10)',
    );
    expect(() => resolveSelector('step number', 2.5, 1, 16)).toThrow(InvalidSelectorError);
  });

  test('random draws within bounds', () => {
    expect(resolveSelector('part number', 'random', 1, 10, () => 0.35)).toBe(4);
  });
});

describe('samples and knobs', () => {
  test('sample range is 0..99', () => {
    expect(resolveSample(0)).toBe(0);
    expect(resolveSample(99)).toBe(99);
    expect(() => resolveSample(100)).toThrow(OutOfRangeError);
    expect(() => resolveSample(-1)).toThrow(OutOfRangeError);
    expect(resolveSample('random', () => 0.999)).toBe(99);
  });

  test('knob ranges are per parameter', () => {
    expect(resolveKnobValue('speed', 40)).toBe(40);
    expect(() => resolveKnobValue('speed', 39)).toThrow(
      "'speed' parameter value 39 is out of range (should be between 40 & 88)",
    );
    expect(() => resolveKnobValue('pan', 0)).toThrow(OutOfRangeError);
    expect(resolveKnobValue('level', 0)).toBe(0);
  });

  test('random knob values use the parameter range', () => {
    expect(resolveKnobValue('speed', 'random', () => 0)).toBe(40);
    expect(resolveKnobValue('speed', 'random', () => 0.9999)).toBe(88);
    expect(resolveKnobValue('pan', 'random', () => 0)).toBe(1);
  });
});

describe('motion values', () => {
  test('two-lane parameters need two values', () => {
    expect(() => validateMotionValue('pan', [fixed(10)])).toThrow(MalformedMotionInputError);
    expect(() => validateMotionValue('pan', [fixed(10), fixed(20)])).not.toThrow();
  });

  test('single-lane parameters take exactly one value', () => {
    expect(() => validateMotionValue('hi_cut', [fixed(10), fixed(20)])).toThrow(
      "'hi_cut' motion parameter should have 1 value",
    );
    expect(() => validateMotionValue('hi_cut', [])).toThrow(MalformedMotionInputError);
    expect(() => validateMotionValue('level', [fixed(1), fixed(2), fixed(3)])).toThrow(MalformedMotionInputError);
  });

  test('motion values must be 1..127', () => {
    expect(() => validateMotionValue('hi_cut', [fixed(0)])).toThrow(OutOfRangeError);
    expect(() => validateMotionValue('hi_cut', [fixed(128)])).toThrow(OutOfRangeError);
    expect(() => validateMotionValue('hi_cut', [fixed(127)])).not.toThrow();
  });

  test('stored bytes carry the bias except for speed', () => {
    expect(resolveMotionValues('pan', [1, 127])).toEqual([129, 255]);
    expect(resolveMotionValues('speed', [40, 88])).toEqual([40, 88]);
    expect(resolveMotionValues('hi_cut', [64])).toEqual([192]);
  });

  test('random motion values are biased', () => {
    expect(resolveMotionValues('hi_cut', ['random'], () => 0)).toEqual([129]);
    expect(resolveMotionValues('speed', ['random', 'random'], () => 0)).toEqual([1, 1]);
  });
});

