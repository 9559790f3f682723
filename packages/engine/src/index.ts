export * from './params/registry.js';
export { createSeededRng, randomInt, defaultRng, type Rng } from './params/random.js';
export { RANDOM, random, fixed, toValue, formatValue, type Value, type ValueInput } from './params/value.js';
export * from './params/validate.js';

export { Part } from './model/part.js';
export { Pattern, PATTERN_HEADER, PATTERN_DEVICE_CODE, PATTERN_ACTIVE_STEP, PATTERN_FOOTER } from './model/pattern.js';
export { FunctionSet } from './model/functionSet.js';
export {
  PartEditor,
  type PartAddress,
  type StepFlag,
  type ParamValues,
  type MotionValues,
  type MotionReading,
  type MotionPair,
} from './model/partEditor.js';
export { Project, type ProjectOptions } from './model/project.js';

export * from './export/index.js';
export { decodePart, decodePattern, readPatternFile, getPatternSummary } from './import/patternReader.js';
export * from './script/index.js';
export * from './util/index.js';
