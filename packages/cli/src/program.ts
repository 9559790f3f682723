import { Command } from 'commander';
import { readFileSync } from 'fs';
import {
  Project,
  ScriptDiagnostic,
  Statement,
  SyroEncoder,
  SyroError,
  checkScript,
  configureLogging,
  createSeededRng,
  exportProject,
  formatDiagnostic,
  getPatternSummary,
  parseScript,
  readPatternFile,
  runScript,
  ScriptError,
  defaultRng,
} from '@syroseq/engine';

export interface CliContext {
  /** Where exit codes go; defaults to `process.exitCode`. */
  setExitCode?: (code: number) => void;
  /** Encoder runner override, used instead of spawning the executable. */
  encoder?: SyroEncoder;
}

type GlobalOptions = {
  verbose?: boolean;
  debug?: boolean;
};

type BuildOptions = {
  outDir?: string;
  encode: boolean;
  encoder?: string;
  seed?: string;
};

type LoadResult = { statements: Statement[]; diagnostics: string[] };

function describeError(err: unknown, debug: boolean): string {
  if (err instanceof Error) return debug && err.stack ? err.stack : err.message;
  return String(err);
}

function scriptDiagnostic(file: string, d: ScriptDiagnostic): string {
  return formatDiagnostic('ERROR', 'script', d.message, { file, loc: d.loc });
}

function scriptErrorDiagnostic(file: string, e: ScriptError): string {
  return formatDiagnostic('ERROR', 'script', e.message, { file, loc: { line: e.line, column: e.column } });
}

function loadScript(file: string): LoadResult {
  const src = readFileSync(file, 'utf8');
  const { statements, errors } = parseScript(src);
  return { statements, diagnostics: errors.map(e => scriptDiagnostic(file, e)) };
}

function parseSeed(seed: string | undefined): number | undefined {
  if (seed === undefined) return undefined;
  const n = parseInt(seed, 10);
  if (!Number.isFinite(n)) throw new Error(`invalid seed '${seed}'`);
  return n;
}

export function createProgram(ctx: CliContext = {}): Command {
  const setExitCode = ctx.setExitCode ?? ((code: number) => { process.exitCode = code; });
  const program = new Command();

  program
    .name('syroseq')
    .description('Program Volca Sample patterns from scripts and encode them as syro streams')
    .version('0.1.0');

  // Global options
  program
    .option('-v, --verbose', 'Enable verbose output for all commands')
    .option('--debug', 'Enable debug output (print stack traces)');

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  program.hook('preAction', () => {
    const { verbose, debug } = globals();
    if (debug) configureLogging({ level: 'debug' });
    else if (verbose) configureLogging({ level: 'info' });
  });

  program
    .command('build')
    .description('Run a pattern script and export the modified patterns')
    .argument('<script>', 'Path to the pattern script')
    .argument('[base]', 'Base name for the pattern files and the audio stream (defaults to the script name)')
    .option('-o, --out-dir <dir>', 'Directory for generated files')
    .option('--no-encode', 'Only write the pattern files; do not run the syro encoder')
    .option('--encoder <path>', 'Path of the syro encoder executable')
    .option('--seed <n>', 'Seed for random values, for reproducible output')
    .action(async (file: string, base: string | undefined, options: BuildOptions) => {
      const debug = globals().debug === true;
      let loaded: LoadResult;
      try {
        loaded = loadScript(file);
      } catch (err) {
        console.error(`Failed to read ${file}:`, describeError(err, debug));
        setExitCode(2);
        return;
      }
      if (loaded.diagnostics.length > 0) {
        console.error(`Validation failed for ${file}:`);
        for (const d of loaded.diagnostics) console.error('  -', d);
        setExitCode(2);
        return;
      }

      let project: Project;
      try {
        const seed = parseSeed(options.seed);
        project = new Project({ rng: seed === undefined ? defaultRng : createSeededRng(seed) });
        runScript(project, loaded.statements);
      } catch (err) {
        if (err instanceof ScriptError) console.error(scriptErrorDiagnostic(file, err));
        else console.error('Error:', describeError(err, debug));
        setExitCode(2);
        return;
      }

      const baseName = base ?? file.replace(/\.[^/.]+$/, '');
      try {
        const result = await exportProject(project, baseName, {
          outDir: options.outDir,
          encode: options.encode,
          encoder: ctx.encoder,
          encoderConfig: { executable: options.encoder },
        });
        if (result.patterns.length === 0) {
          console.log('No patterns were modified; nothing exported');
          return;
        }
        for (const f of result.files) console.log('Wrote', f);
        if (result.output) console.log('[OK] Syro stream written to', result.output);
        else console.log(`[OK] Exported ${result.files.length} pattern file(s)`);
      } catch (err) {
        if (err instanceof SyroError) console.error(`Export failed (${err.code}):`, describeError(err, debug));
        else console.error('Export failed:', describeError(err, debug));
        setExitCode(1);
      }
    });

  program
    .command('verify')
    .description('Parse and validate a pattern script; exit 0 if valid, non-zero if invalid')
    .argument('<script>', 'Path to the pattern script')
    .action((file: string) => {
      const debug = globals().debug === true;
      try {
        const { statements, diagnostics } = loadScript(file);
        const errors = diagnostics.length ? diagnostics : checkScript(statements).map(e => scriptErrorDiagnostic(file, e));
        if (errors.length > 0) {
          console.error(`Validation failed for ${file}:`);
          for (const e of errors) console.error('  -', e);
          setExitCode(2);
        } else {
          console.log(`OK: ${file} parsed and validated (${statements.length} statements)`);
          setExitCode(0);
        }
      } catch (err) {
        console.error('Error reading script:', describeError(err, debug));
        setExitCode(2);
      }
    });

  program
    .command('inspect')
    .description('Decode a pattern file and print its contents')
    .argument('<file>', 'Path to a pattern .dat file')
    .action((file: string) => {
      try {
        console.log(getPatternSummary(readPatternFile(file)));
      } catch (err) {
        console.error('Failed to inspect file:', describeError(err, globals().debug === true));
        setExitCode(2);
      }
    });

  return program;
}
