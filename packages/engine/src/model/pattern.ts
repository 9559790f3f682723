import { NUM_PARTS } from '../params/registry.js';
import { Part } from './part.js';

export const PATTERN_HEADER = 0x54535450; // "PTST"
export const PATTERN_DEVICE_CODE = 0x33b8;
export const PATTERN_ACTIVE_STEP = 0xffff;
export const PATTERN_FOOTER = 0x44455450; // "PTED"

export class Pattern {
  readonly header = PATTERN_HEADER;
  readonly deviceCode = PATTERN_DEVICE_CODE;
  readonly activeStep = PATTERN_ACTIVE_STEP;
  readonly footer = PATTERN_FOOTER;
  readonly parts: readonly Part[];

  constructor() {
    const parts: Part[] = [];
    for (let i = 0; i < NUM_PARTS; i++) parts.push(new Part());
    this.parts = parts;
  }
}
