import { Project } from '../src/model/project';
import { FUNCTION_NAMES, PARAM_NAMES, knobRangeFor } from '../src/params/registry';
import { fixed, random } from '../src/params/value';
import {
  InvalidSelectorError,
  MalformedMotionInputError,
  MissingArgumentError,
  OutOfRangeError,
  UnknownFunctionError,
  UnknownParameterError,
} from '../src/util/errors';

describe('cursor', () => {
  test('select then read back every pattern/part pair', () => {
    const project = new Project();
    for (let p = 1; p <= 10; p++) {
      for (let q = 1; q <= 10; q++) {
        project.selectPattern(p);
        project.selectPart(q);
        expect(project.getPattern()).toBe(p);
        expect(project.getPart()).toBe(q);
      }
    }
  });

  test('out-of-bounds selectors are rejected and leave the cursor alone', () => {
    const project = new Project();
    project.selectPattern(3);
    expect(() => project.selectPattern(11)).toThrow(InvalidSelectorError);
    expect(() => project.selectPart(0)).toThrow(InvalidSelectorError);
    expect(project.getPattern()).toBe(3);
    expect(project.getPart()).toBe(1);
  });

  test('random selection uses the project generator', () => {
    const project = new Project({ rng: () => 0.55 });
    project.selectPattern('random');
    project.selectPart(random());
    expect(project.getPattern()).toBe(6);
    expect(project.getPart()).toBe(6);
  });
});

describe('part state', () => {
  let project: Project;

  beforeEach(() => {
    project = new Project();
  });

  test('knob values round-trip at both ends of every range', () => {
    for (const name of PARAM_NAMES) {
      const { min, max } = knobRangeFor(name);
      project.setParams({ [name]: min });
      expect(project.getParam(name)).toBe(min);
      project.setParams({ [name]: max });
      expect(project.getParam(name)).toBe(max);
    }
  });

  test('pan range', () => {
    expect(() => project.setParams({ pan: 0 })).toThrow(OutOfRangeError);
    expect(() => project.setParams({ pan: 128 })).toThrow(OutOfRangeError);
    project.setParams({ pan: 64 });
    expect(project.getParam('pan')).toBe(64);
  });

  test('a rejected set_params call writes nothing', () => {
    project.setParams({ level: 10 });
    expect(() => project.setParams({ level: 20, speed: 100 })).toThrow(OutOfRangeError);
    expect(() => project.setParams({ level: 30, volume: 1 })).toThrow(UnknownParameterError);
    expect(project.getParam('level')).toBe(10);
  });

  test('set_step turns on a single step', () => {
    project.setStep(5);
    for (let s = 1; s <= 16; s++) expect(project.stepIsOn(s)).toBe(s === 5);
    expect(() => project.setStep(17)).toThrow(InvalidSelectorError);
    expect(() => project.stepIsOn(0)).toThrow(InvalidSelectorError);
  });

  test('set_steps only ever turns steps on', () => {
    project.setStep(2);
    project.setSteps([1, 0, 0, 1]);
    expect(project.current().part.stepMask).toBe(0b1011);
    project.setSteps([0, 0, 0, 0]);
    expect(project.current().part.stepMask).toBe(0b1011);
    project.setSteps([false, false, true]);
    expect(project.current().part.activeSteps()).toEqual([1, 2, 3, 4]);
  });

  test('set_steps rejects more than 16 flags', () => {
    expect(() => project.setSteps(new Array<0 | 1>(17).fill(1))).toThrow(InvalidSelectorError);
    expect(project.current().part.stepMask).toBe(0);
  });

  test('functions are independent and idempotent', () => {
    project.setFunctions('reverb');
    expect(project.functionIsOn('reverb')).toBe(true);
    for (const f of FUNCTION_NAMES.filter(n => n !== 'reverb')) {
      expect(project.functionIsOn(f)).toBe(false);
    }
    project.setFunctions('reverb', 'mute');
    expect(project.getFunctions()).toEqual(['reverb', 'mute']);
    expect(project.current().part.functions.mask).toBe(0x14);
  });

  test('an unknown function rejects the whole call', () => {
    expect(() => project.setFunctions('loop', 'chorus')).toThrow(UnknownFunctionError);
    expect(project.functionIsOn('loop')).toBe(false);
    expect(() => project.functionIsOn('chorus')).toThrow(UnknownFunctionError);
  });

  test('samples', () => {
    project.setSample(42);
    expect(project.getSample()).toBe(42);
    expect(() => project.setSample(100)).toThrow(OutOfRangeError);
    expect(project.getSample()).toBe(42);
  });
});

describe('motion', () => {
  test('two-lane parameters read back as a start/end pair', () => {
    const project = new Project();
    project.setMotionParams(3, { pan: [1, 127] });
    expect(project.getMotionParam(3, 'pan')).toEqual([1, 127]);
    expect(project.getRawMotion(3, 'pan')).toEqual([129, 255]);
    expect(project.current().part.motion[2 * 16 + 2]).toBe(129);
    expect(project.current().part.motion[3 * 16 + 2]).toBe(255);
  });

  test('single-lane parameters read back as one value', () => {
    const project = new Project();
    project.setMotionParams(16, { hi_cut: [90] });
    expect(project.getMotionParam(16, 'hi_cut')).toBe(90);
    expect(project.getRawMotion(16, 'hi_cut')).toEqual([218]);
    expect(project.current().part.motion[13 * 16 + 15]).toBe(218);
  });

  test('speed is stored unbiased', () => {
    const project = new Project();
    project.setMotionParams(1, { speed: [40, 88] });
    expect(project.getRawMotion(1, 'speed')).toEqual([40, 88]);
    expect(project.getMotionParam(1, 'speed')).toEqual([40, 88]);
  });

  test('unset motion reads as null', () => {
    const project = new Project();
    expect(project.getMotionParam(1, 'level')).toEqual([null, null]);
    expect(project.getMotionParam(1, 'length')).toBeNull();
  });

  test('malformed or out-of-range motion writes nothing', () => {
    const project = new Project();
    expect(() => project.setMotionParams(2, { hi_cut: [50], pan: [64] })).toThrow(MalformedMotionInputError);
    expect(() => project.setMotionParams(2, { level: [0, 10] })).toThrow(OutOfRangeError);
    expect(() => project.setMotionParams(17, { hi_cut: [50] })).toThrow(InvalidSelectorError);
    expect(project.current().part.motion.every(b => b === 0)).toBe(true);
  });

  test('random motion is resolved before storage', () => {
    const project = new Project({ rng: () => 0 });
    project.setMotionParams(4, { level: ['random', fixed(127)], amp_decay: [random()] });
    expect(project.getRawMotion(4, 'level')).toEqual([129, 255]);
    expect(project.getMotionParam(4, 'amp_decay')).toBe(1);
  });
});

describe('modification tracking', () => {
  test('a fresh project has no modified patterns', () => {
    expect(new Project().listModifiedPatterns()).toEqual([]);
  });

  test('a single mutator call marks only its pattern', () => {
    const project = new Project();
    project.selectPattern(4);
    project.setStep(1);
    expect(project.listModifiedPatterns()).toEqual([4]);
    expect(project.modificationCount(4)).toBe(1);
  });

  test('selection and reads do not count', () => {
    const project = new Project();
    project.selectPattern(2);
    project.selectPart(7);
    project.getParam('level');
    project.stepIsOn(1);
    expect(project.listModifiedPatterns()).toEqual([]);
  });

  test('rejected calls do not count', () => {
    const project = new Project();
    expect(() => project.setSample(500)).toThrow(OutOfRangeError);
    expect(project.listModifiedPatterns()).toEqual([]);
  });

  test('setters given nothing to set do not count', () => {
    const project = new Project();
    project.selectPattern(4);
    expect(() => project.setFunctions()).toThrow(MissingArgumentError);
    expect(() => project.setParams({})).toThrow(MissingArgumentError);
    expect(() => project.setMotionParams(1, {})).toThrow(MissingArgumentError);
    project.setSteps([]);
    expect(project.listModifiedPatterns()).toEqual([]);
    expect(project.getFunctions()).toEqual([]);
    expect(project.current().part.stepMask).toBe(0);
  });

  test('patterns are listed in ascending order', () => {
    const project = new Project();
    project.part(9, 1).setSample(1);
    project.part(2, 10).setStep(3);
    project.part(9, 2).setSample(2);
    expect(project.listModifiedPatterns()).toEqual([2, 9]);
    expect(project.modificationCount(9)).toBe(2);
  });
});

describe('explicit part handles', () => {
  test('editors address their part without moving the cursor', () => {
    const project = new Project();
    const editor = project.part(5, 3);
    editor.setSample(12);
    editor.setParams({ speed: 50 });
    expect(editor.address).toEqual({ pattern: 5, part: 3 });
    expect(project.getPattern()).toBe(1);
    expect(project.patterns[4].parts[2].sampleIndex).toBe(12);
    expect(project.part(5, 3).getParam('speed')).toBe(50);
    expect(project.getSample()).toBe(0);
  });

  test('cursor calls go through the same part', () => {
    const project = new Project();
    project.selectPattern(10);
    project.selectPart(10);
    project.setSample(99);
    expect(project.part(10, 10).getSample()).toBe(99);
  });

  test('bad addresses are rejected', () => {
    const project = new Project();
    expect(() => project.part(0, 1)).toThrow(InvalidSelectorError);
    expect(() => project.part(1, 11)).toThrow(InvalidSelectorError);
  });
});
