/**
 * Invocation of the external syro stream encoder.
 *
 * The encoder is a separate executable (built from the Korg syro SDK
 * example) called as:
 *
 *   <exe> <output.wav> p01:<file> p02:<file> ...
 *
 * It packs every pattern file it is given into a single audio stream that
 * the hardware loads through its sync input.
 */
import { spawn } from 'child_process';
import { NUM_PATTERNS } from '../params/registry.js';
import { createLogger } from '../util/logger.js';
import { EncoderFailedError, InvalidSelectorError, UnsupportedPlatformError } from '../util/errors.js';

const log = createLogger('encoder');

export interface EncodeRequest {
  /** Path of the audio file to produce, relative to `cwd` when set. */
  output: string;
  /** `pNN:<file>` tokens, in pattern order. */
  tokens: string[];
  cwd?: string;
}

export interface SyroEncoder {
  encode(request: EncodeRequest): Promise<void>;
}

export interface EncoderConfig {
  /** Explicit executable path; wins over the environment and platform defaults. */
  executable?: string;
  platform?: NodeJS.Platform;
  arch?: string;
  env?: NodeJS.ProcessEnv;
}

export const ENCODER_ENV_VAR = 'SYROSEQ_ENCODER';

const PLATFORM_EXECUTABLES: Record<string, string> = {
  'linux/x64': 'syro_volcasample_linux.x86_64',
  'linux/ia32': 'syro_volcasample_linux.i686',
};

/** Two-digit pattern tag as the encoder expects it, e.g. 3 -> "p03". */
export function patternTag(patternNo: number): string {
  if (!Number.isInteger(patternNo) || patternNo < 1 || patternNo > NUM_PATTERNS) {
    throw new InvalidSelectorError(`pattern number ${patternNo} is out of bounds (should be between 1 & ${NUM_PATTERNS})`);
  }
  return `p${String(patternNo).padStart(2, '0')}`;
}

export function patternToken(patternNo: number, fileName: string): string {
  return `${patternTag(patternNo)}:${fileName}`;
}

export function resolveEncoderExecutable(config: EncoderConfig = {}): string {
  if (config.executable) return config.executable;
  const fromEnv = (config.env ?? process.env)[ENCODER_ENV_VAR];
  if (fromEnv) return fromEnv;

  const platform = config.platform ?? process.platform;
  const arch = config.arch ?? process.arch;
  const exe = PLATFORM_EXECUTABLES[`${platform}/${arch}`];
  if (!exe) {
    throw new UnsupportedPlatformError(
      `no syro encoder known for ${platform}/${arch}; set ${ENCODER_ENV_VAR} or pass an explicit executable`,
    );
  }
  // bundled encoders live next to the working directory, as shipped by the SDK
  return `./${exe}`;
}

/** Runs the encoder executable as a child process. */
export class SpawnEncoder implements SyroEncoder {
  constructor(private readonly config: EncoderConfig = {}) {}

  encode(request: EncodeRequest): Promise<void> {
    const exe = resolveEncoderExecutable(this.config);
    const args = [request.output, ...request.tokens];
    log.info(`Running ${exe} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      const proc = spawn(exe, args, { cwd: request.cwd, stdio: 'pipe' });
      let stderr = '';
      proc.stderr.on('data', (chunk: Buffer) => { stderr += chunk.toString(); });
      proc.stdout.on('data', (chunk: Buffer) => { log.debug(chunk.toString().trimEnd()); });

      proc.on('error', (err: Error) => {
        if ('code' in err && err.code === 'ENOENT') {
          reject(new UnsupportedPlatformError(`syro encoder '${exe}' was not found`));
        } else {
          reject(new EncoderFailedError(null, `failed to start syro encoder '${exe}': ${err.message}`));
        }
      });

      proc.on('close', (code: number | null) => {
        if (code === 0) {
          resolve();
        } else {
          const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
          reject(new EncoderFailedError(code, `syro encoder exited with code ${code}${detail}`));
        }
      });
    });
  }
}
