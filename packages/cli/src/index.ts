// Re-export convenient top-level helpers from the engine package so the CLI
// package can expose a single entrypoint for tools and scripts.
export { Project, exportProject, parseScript, runScript, readPatternFile } from '@syroseq/engine';
export { createProgram, type CliContext } from './program.js';
