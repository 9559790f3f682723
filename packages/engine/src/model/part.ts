/**
 * Programmable state of one part (track) of one pattern.
 */
import {
  DEFAULT_PARAMS,
  MOTION_SLOTS,
  NUM_PARAMS,
  NUM_STEPS,
} from '../params/registry.js';
import { LayoutError } from '../util/errors.js';
import { FunctionSet } from './functionSet.js';

/** Framing bytes the hardware struct carries; never user-settable. */
export const PART_ACCENT = 0;
export const PART_RESERVED_HI = 0xff;
export const PART_RESERVED_LO = 0x00;
export const PART_LEVEL = 0x7f;

export class Part {
  sampleIndex = 0;
  stepMask = 0;
  readonly functions = new FunctionSet();
  // fixed length; entries are overwritten through setParam/setMotion only
  private readonly knobs: number[] = [...DEFAULT_PARAMS];
  private readonly motionBytes: number[] = new Array<number>(MOTION_SLOTS).fill(0);

  get params(): readonly number[] {
    return this.knobs;
  }

  get motion(): readonly number[] {
    return this.motionBytes;
  }

  setParam(index: number, value: number): void {
    this.knobs[checkIndex('param', index, NUM_PARAMS)] = value;
  }

  setMotion(slot: number, value: number): void {
    this.motionBytes[checkIndex('motion', slot, MOTION_SLOTS)] = value;
  }

  stepIsOn(step: number): boolean {
    return (this.stepMask & (1 << (step - 1))) !== 0;
  }

  /** 1-based numbers of the steps that trigger playback. */
  activeSteps(): number[] {
    const steps: number[] = [];
    for (let s = 1; s <= NUM_STEPS; s++) {
      if (this.stepIsOn(s)) steps.push(s);
    }
    return steps;
  }
}

function checkIndex(what: string, index: number, size: number): number {
  if (!Number.isInteger(index) || index < 0 || index >= size) {
    throw new LayoutError(`${what} index ${index} is outside 0..${size - 1}`);
  }
  return index;
}
