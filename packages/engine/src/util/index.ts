/**
 * Utility modules for the syroseq engine.
 */

// Logger - centralized logging system
export {
  createLogger,
  configureLogging,
  loadLoggingFromEnv,
  getLoggingConfig,
  resetLogging,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';

// Diagnostics - structured error/warning reporting
export {
  formatDiagnostic,
  warn,
  type DiagLevel,
  type DiagMeta,
  type SourcePosition,
} from './diag.js';

export * from './errors.js';
