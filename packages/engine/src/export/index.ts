/**
 * Project export: one pattern file per modified pattern, then a single run of
 * the syro encoder over all of them.
 */
import { mkdirSync } from 'fs';
import { basename, dirname, join } from 'path';
import { Project } from '../model/project.js';
import { createLogger } from '../util/logger.js';
import { IOFailureError } from '../util/errors.js';
import { warn } from '../util/diag.js';
import { writePatternFile } from './patternWriter.js';
import { EncoderConfig, SpawnEncoder, SyroEncoder, patternTag, patternToken } from './syroEncoder.js';

const log = createLogger('export');

export interface ExportOptions {
  /** Directory for the pattern files and the audio output; defaults to the directory of `baseName`. */
  outDir?: string;
  /** Run the encoder after writing pattern files (default true). */
  encode?: boolean;
  /** Encoder runner; defaults to spawning the platform executable. */
  encoder?: SyroEncoder;
  encoderConfig?: EncoderConfig;
}

export interface ExportResult {
  /** 1-based pattern numbers that were exported, ascending. */
  patterns: number[];
  /** Paths of the written pattern files, in pattern order. */
  files: string[];
  /** Encoder tokens, e.g. `p03:song_p03.dat`. */
  tokens: string[];
  /** Path of the audio stream, or null when the encoder was not run. */
  output: string | null;
}

export function patternFileName(baseName: string, patternNo: number): string {
  return `${baseName}_${patternTag(patternNo)}.dat`;
}

export function streamFileName(baseName: string): string {
  return `${baseName}.wav`;
}

/**
 * Export every modified pattern of `project`.
 *
 * Modification counters are left untouched, so exporting an unchanged project
 * again writes the same patterns with identical bytes. A write failure aborts
 * the export; files written before it stay on disk.
 */
export async function exportProject(project: Project, baseName: string, opts: ExportOptions = {}): Promise<ExportResult> {
  const outDir = opts.outDir ?? dirname(baseName);
  const name = basename(baseName);
  const patterns = project.listModifiedPatterns();

  if (patterns.length === 0) {
    warn('export', 'no modified patterns; nothing to export', { file: baseName });
    return { patterns, files: [], tokens: [], output: null };
  }

  try {
    mkdirSync(outDir, { recursive: true });
  } catch (err) {
    throw new IOFailureError(outDir, err);
  }

  const files: string[] = [];
  const tokens: string[] = [];
  for (const n of patterns) {
    const fileName = patternFileName(name, n);
    const filePath = join(outDir, fileName);
    const bytes = writePatternFile(project.patternAt(n), filePath);
    log.info(`Wrote pattern ${n} to ${filePath} (${bytes} bytes)`);
    files.push(filePath);
    tokens.push(patternToken(n, fileName));
  }

  if (opts.encode === false) {
    return { patterns, files, tokens, output: null };
  }

  const encoder = opts.encoder ?? new SpawnEncoder(opts.encoderConfig);
  const output = streamFileName(name);
  await encoder.encode({ output, tokens, cwd: outDir });
  const outputPath = join(outDir, output);
  log.info(`Encoded ${patterns.length} pattern(s) into ${outputPath}`);

  return { patterns, files, tokens, output: outputPath };
}

export { encodePart, encodePattern, writePatternFile } from './patternWriter.js';
export {
  PART_LAYOUT,
  PATTERN_LAYOUT,
  PART_RECORD_SIZE,
  PART_REGION_SIZE,
  PATTERN_RECORD_SIZE,
  defineLayout,
  encodeRecord,
  decodeRecord,
  fieldOf,
  type Layout,
  type LayoutField,
  type FieldKind,
  type FieldSpec,
  type RecordValues,
  type DecodedRecord,
} from './layout.js';
export {
  SpawnEncoder,
  patternTag,
  patternToken,
  resolveEncoderExecutable,
  ENCODER_ENV_VAR,
  type SyroEncoder,
  type EncodeRequest,
  type EncoderConfig,
} from './syroEncoder.js';
