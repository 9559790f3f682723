#!/usr/bin/env node
import { loadLoggingFromEnv } from '@syroseq/engine';
import { createProgram } from './program.js';

loadLoggingFromEnv();

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
