/**
 * Pattern data reader.
 *
 * Decodes files produced by the pattern writer (or by any other tool that
 * emits the same struct) back into `Pattern` values, and summarizes them for
 * the `inspect` command.
 */
import { readFileSync } from 'fs';
import {
  MOTION_SLOTS,
  NUM_PARAMS,
  NUM_PARTS,
  PARAM_NAMES,
  ParamName,
  motionBiasFor,
  motionSlot,
  isTwoLane,
  NUM_STEPS,
} from '../params/registry.js';
import { FunctionSet } from '../model/functionSet.js';
import { Part } from '../model/part.js';
import { PATTERN_FOOTER, PATTERN_HEADER, Pattern } from '../model/pattern.js';
import { DecodedRecord, PART_LAYOUT, PART_RECORD_SIZE, PATTERN_LAYOUT, decodeRecord } from '../export/layout.js';
import { LayoutError } from '../util/errors.js';

function num(rec: DecodedRecord, name: string): number {
  const v = rec[name];
  if (typeof v !== 'number') throw new LayoutError(`field '${name}' is not a number`);
  return v;
}

function list(rec: DecodedRecord, name: string, length: number): number[] {
  const v = rec[name];
  if (!Array.isArray(v) || v.length !== length) throw new LayoutError(`field '${name}' is not a list of ${length}`);
  return v;
}

function bytes(rec: DecodedRecord, name: string): Uint8Array {
  const v = rec[name];
  if (!(v instanceof Uint8Array)) throw new LayoutError(`field '${name}' is not a byte array`);
  return v;
}

export function decodePart(data: Uint8Array, offset = 0, part: Part = new Part()): Part {
  const rec = decodeRecord(PART_LAYOUT, data, offset);
  part.sampleIndex = num(rec, 'sampleIndex');
  part.stepMask = num(rec, 'stepMask');
  list(rec, 'params', NUM_PARAMS).forEach((v, i) => part.setParam(i, v));
  FunctionSet.fromMask(num(rec, 'functions')).toArray().forEach(f => part.functions.add(f));
  list(rec, 'motion', MOTION_SLOTS).forEach((v, i) => part.setMotion(i, v));
  return part;
}

/**
 * Decode a full pattern record. Throws `LayoutError` when the size or the
 * header/footer magic does not match.
 */
export function decodePattern(data: Uint8Array): Pattern {
  if (data.byteLength !== PATTERN_LAYOUT.size) {
    throw new LayoutError(`pattern data is ${data.byteLength} bytes, expected ${PATTERN_LAYOUT.size}`);
  }
  const rec = decodeRecord(PATTERN_LAYOUT, data);
  const header = num(rec, 'header');
  const footer = num(rec, 'footer');
  if (header !== PATTERN_HEADER) {
    throw new LayoutError(`bad pattern header 0x${header.toString(16)}`);
  }
  if (footer !== PATTERN_FOOTER) {
    throw new LayoutError(`bad pattern footer 0x${footer.toString(16)}`);
  }

  const region = bytes(rec, 'parts');
  const pattern = new Pattern();
  for (let i = 0; i < NUM_PARTS; i++) {
    decodePart(region, i * PART_RECORD_SIZE, pattern.parts[i]);
  }
  return pattern;
}

export function readPatternFile(filePath: string): Pattern {
  return decodePattern(readFileSync(filePath));
}

function motionSteps(part: Part, param: ParamName): string[] {
  const out: string[] = [];
  for (let s = 1; s <= NUM_STEPS; s++) {
    const start = part.motion[motionSlot(param, s)];
    if (start === 0) continue;
    const bias = motionBiasFor(param);
    if (isTwoLane(param)) {
      const end = part.motion[motionSlot(param, s, 1)];
      out.push(`${s}:${start - bias}>${end === 0 ? '-' : end - bias}`);
    } else {
      out.push(`${s}:${start - bias}`);
    }
  }
  return out;
}

/** Human-readable summary of a pattern, one block per part. */
export function getPatternSummary(pattern: Pattern): string {
  const lines: string[] = [];
  lines.push(`Header: 0x${pattern.header.toString(16)}  Device: 0x${pattern.deviceCode.toString(16)}  Footer: 0x${pattern.footer.toString(16)}`);
  pattern.parts.forEach((part, i) => {
    const grid = Array.from({ length: NUM_STEPS }, (_, s) => (part.stepIsOn(s + 1) ? 'x' : '.')).join('');
    const funcs = part.functions.toArray();
    lines.push(`Part ${String(i + 1).padStart(2, '0')}: sample=${part.sampleIndex} steps=${grid} funcs=${funcs.length ? funcs.join(',') : '-'}`);
    lines.push(`  params: ${PARAM_NAMES.map((p, j) => `${p}=${part.params[j]}`).join(' ')}`);
    for (const param of PARAM_NAMES) {
      const steps = motionSteps(part, param);
      if (steps.length) lines.push(`  motion ${param}: ${steps.join(' ')}`);
    }
  });
  return lines.join('\n');
}
