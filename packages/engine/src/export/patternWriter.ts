/**
 * Pattern data writer.
 *
 * Packs parts and patterns into the byte layout the syro stream encoder
 * reads from its `pNN:` inputs. Encoding is pure: the same state always
 * yields the same bytes.
 */
import { writeFileSync } from 'fs';
import { NUM_PARTS } from '../params/registry.js';
import { Part, PART_ACCENT, PART_LEVEL, PART_RESERVED_HI, PART_RESERVED_LO } from '../model/part.js';
import { Pattern } from '../model/pattern.js';
import { IOFailureError, LayoutError } from '../util/errors.js';
import { PART_LAYOUT, PATTERN_LAYOUT, encodeRecord } from './layout.js';

export function encodePart(part: Readonly<Part>): Buffer {
  return encodeRecord(PART_LAYOUT, {
    sampleIndex: part.sampleIndex,
    stepMask: part.stepMask,
    accent: PART_ACCENT,
    reservedHi: PART_RESERVED_HI,
    reservedLo: PART_RESERVED_LO,
    level: PART_LEVEL,
    params: part.params,
    functions: part.functions.mask,
    motion: part.motion,
  });
}

export function encodePattern(pattern: Pattern): Buffer {
  if (pattern.parts.length !== NUM_PARTS) {
    throw new LayoutError(`pattern has ${pattern.parts.length} parts, expected ${NUM_PARTS}`);
  }
  const parts = Buffer.concat(pattern.parts.map(encodePart));
  return encodeRecord(PATTERN_LAYOUT, {
    header: pattern.header,
    deviceCode: pattern.deviceCode,
    activeStep: pattern.activeStep,
    parts,
    footer: pattern.footer,
  });
}

/** Encode and write one pattern file; returns the number of bytes written. */
export function writePatternFile(pattern: Pattern, outputPath: string): number {
  const out = encodePattern(pattern);
  try {
    writeFileSync(outputPath, out);
  } catch (err) {
    throw new IOFailureError(outputPath, err);
  }
  return out.length;
}
