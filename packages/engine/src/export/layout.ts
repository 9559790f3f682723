/**
 * Binary layouts of the Volca Sample part and pattern structs.
 *
 * A layout is an ordered field list; offsets and the total size are derived
 * from it, and the same description drives both encoding and decoding.
 *
 * Part record (256 bytes):
 *   sampleIndex u16, stepMask u16, accent u16, reservedHi u8 (0xff),
 *   reservedLo u8 (0x00), level u8 (0x7f), params u8 x11, functions u8,
 *   11 bytes padding, motion u8 x224
 *
 * Pattern record (2624 bytes):
 *   header u32, deviceCode u16, 2 bytes padding, activeStep u16,
 *   22 bytes padding, parts (10 part records, 2560 bytes), 28 bytes padding,
 *   footer u32
 *
 * All integers are little-endian.
 */
import { MOTION_SLOTS, NUM_PARAMS, NUM_PARTS } from '../params/registry.js';
import { LayoutError } from '../util/errors.js';
import { BinaryReader, BinaryWriter } from './binaryWriter.js';

export type FieldKind = 'u8' | 'u16' | 'u32' | 'pad' | 'bytes';

export interface FieldSpec {
  name: string;
  kind: FieldKind;
  /** Element count for u8 arrays, byte length for pad and bytes. */
  count?: number;
}

export interface LayoutField extends FieldSpec {
  count: number;
  offset: number;
  size: number;
}

export interface Layout {
  name: string;
  fields: readonly LayoutField[];
  size: number;
}

export type FieldValue = number | readonly number[] | Uint8Array;

export type RecordValues = Readonly<Record<string, FieldValue>>;

export type DecodedValue = number | number[] | Uint8Array;

export type DecodedRecord = Record<string, DecodedValue>;

const WIDTH: Record<FieldKind, number> = { u8: 1, u16: 2, u32: 4, pad: 1, bytes: 1 };

export function defineLayout(name: string, specs: readonly FieldSpec[]): Layout {
  let offset = 0;
  const fields = specs.map((spec): LayoutField => {
    const count = spec.count ?? 1;
    if (count < 1 || (count > 1 && (spec.kind === 'u16' || spec.kind === 'u32'))) {
      throw new LayoutError(`${name}.${spec.name}: unsupported count ${count} for ${spec.kind}`);
    }
    const size = WIDTH[spec.kind] * count;
    const field = { ...spec, count, offset, size };
    offset += size;
    return field;
  });
  return { name, fields, size: offset };
}

export function fieldOf(layout: Layout, name: string): LayoutField {
  const field = layout.fields.find(f => f.name === name);
  if (!field) throw new LayoutError(`${layout.name} has no field '${name}'`);
  return field;
}

export const PART_LAYOUT = defineLayout('part', [
  { name: 'sampleIndex', kind: 'u16' },
  { name: 'stepMask', kind: 'u16' },
  { name: 'accent', kind: 'u16' },
  { name: 'reservedHi', kind: 'u8' },
  { name: 'reservedLo', kind: 'u8' },
  { name: 'level', kind: 'u8' },
  { name: 'params', kind: 'u8', count: NUM_PARAMS },
  { name: 'functions', kind: 'u8' },
  { name: 'padding', kind: 'pad', count: 11 },
  { name: 'motion', kind: 'u8', count: MOTION_SLOTS },
]);

export const PART_RECORD_SIZE = PART_LAYOUT.size; // 256

// The struct declares the part region by size; it is not derived from the data.
export const PART_REGION_SIZE = 2560;

export const PATTERN_LAYOUT = defineLayout('pattern', [
  { name: 'header', kind: 'u32' },
  { name: 'deviceCode', kind: 'u16' },
  { name: 'padding1', kind: 'pad', count: 2 },
  { name: 'activeStep', kind: 'u16' },
  { name: 'padding2', kind: 'pad', count: 22 },
  { name: 'parts', kind: 'bytes', count: PART_REGION_SIZE },
  { name: 'padding3', kind: 'pad', count: 28 },
  { name: 'footer', kind: 'u32' },
]);

export const PATTERN_RECORD_SIZE = PATTERN_LAYOUT.size; // 2624

if (PART_RECORD_SIZE * NUM_PARTS !== PART_REGION_SIZE) {
  throw new LayoutError(`part region ${PART_REGION_SIZE} does not hold ${NUM_PARTS} part records of ${PART_RECORD_SIZE}`);
}

function scalar(layout: Layout, field: LayoutField, value: FieldValue | undefined): number {
  if (typeof value !== 'number') {
    throw new LayoutError(`${layout.name}.${field.name}: expected a number`);
  }
  return value;
}

/**
 * Serialize `values` according to `layout`. Padding fields need no value.
 * A missing or wrongly sized value is a programming error.
 */
export function encodeRecord(layout: Layout, values: RecordValues): Buffer {
  const w = new BinaryWriter();
  for (const field of layout.fields) {
    const value = values[field.name];
    switch (field.kind) {
      case 'pad':
        w.writeZeros(field.count);
        break;
      case 'u16':
        w.writeU16(scalar(layout, field, value));
        break;
      case 'u32':
        w.writeU32(scalar(layout, field, value));
        break;
      case 'u8':
        if (field.count === 1) {
          w.writeU8(scalar(layout, field, value));
        } else {
          if (typeof value === 'number' || value === undefined || value.length !== field.count) {
            throw new LayoutError(`${layout.name}.${field.name}: expected ${field.count} values`);
          }
          for (const b of value) w.writeU8(b);
        }
        break;
      case 'bytes':
        if (!(value instanceof Uint8Array)) {
          throw new LayoutError(`${layout.name}.${field.name}: expected a byte array`);
        }
        w.writeBytes(value, field.count);
        break;
    }
  }
  if (w.length !== layout.size) {
    throw new LayoutError(`${layout.name}: encoded ${w.length} bytes, layout declares ${layout.size}`);
  }
  return w.toBuffer();
}

/** Inverse of `encodeRecord`; padding fields are skipped. */
export function decodeRecord(layout: Layout, data: Uint8Array, offset = 0): DecodedRecord {
  const r = new BinaryReader(data, offset);
  const out: DecodedRecord = {};
  for (const field of layout.fields) {
    switch (field.kind) {
      case 'pad':
        r.skip(field.count);
        break;
      case 'u16':
        out[field.name] = r.readU16();
        break;
      case 'u32':
        out[field.name] = r.readU32();
        break;
      case 'u8':
        if (field.count === 1) {
          out[field.name] = r.readU8();
        } else {
          out[field.name] = Array.from(r.readBytes(field.count));
        }
        break;
      case 'bytes':
        out[field.name] = r.readBytes(field.count);
        break;
    }
  }
  return out;
}
