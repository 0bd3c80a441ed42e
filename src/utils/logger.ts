/**
 * Diagnostics for framescan. Listings and help text own stdout, so log lines
 * of every severity are written to stderr, one per call.
 *
 * LOG_LEVEL sets the quietest severity shown; LOG_FORMAT picks
 * `[time] [LEVEL] message {meta}` text or one JSON object per line.
 */
import { env } from '../config.js';

type Severity = 'debug' | 'info' | 'warn' | 'error';
type Fields = Record<string, unknown>;

const RANK: Record<Severity, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function formatLine(severity: Severity, message: string, fields: Fields | undefined, at: string): string {
  if (env.LOG_FORMAT === 'json') {
    return JSON.stringify({ timestamp: at, level: severity, message, ...fields });
  }
  const head = `[${at}] [${severity.toUpperCase()}] ${message}`;
  return fields ? `${head} ${JSON.stringify(fields)}` : head;
}

function emit(severity: Severity, message: string, fields?: Fields): void {
  if (RANK[severity] < RANK[env.LOG_LEVEL]) return;
  process.stderr.write(formatLine(severity, message, fields, new Date().toISOString()) + '\n');
}

export const logger = {
  debug: (message: string, fields?: Fields) => emit('debug', message, fields),
  info: (message: string, fields?: Fields) => emit('info', message, fields),
  warn: (message: string, fields?: Fields) => emit('warn', message, fields),
  error: (message: string, fields?: Fields) => emit('error', message, fields),
};
