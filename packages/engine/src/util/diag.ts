import { createLogger } from './logger.js';

const log = createLogger('diagnostics');

export type DiagLevel = 'WARN' | 'ERROR' | 'INFO';

export interface SourcePosition {
  line: number;
  column?: number;
}

export interface DiagMeta {
  file?: string;
  loc?: SourcePosition;
}

/** `[LEVEL] [component] message file=…, line=…, column=…`; absent fields are left out. */
export function formatDiagnostic(level: DiagLevel, component: string, message: string, meta: DiagMeta = {}): string {
  const fields: string[] = [];
  if (meta.file) fields.push(`file=${meta.file}`);
  if (meta.loc) fields.push(`line=${meta.loc.line}`, `column=${meta.loc.column ?? 0}`);
  const head = `[${level}] [${component}] ${message}`;
  return fields.length ? `${head} ${fields.join(', ')}` : head;
}

export function warn(component: string, message: string, meta?: DiagMeta): void {
  log.warn(formatDiagnostic('WARN', component, message, meta));
}
