import type { LogFields, Logger } from '@viewquery/core';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// stdout belongs to the protocol.
const stderr = (line: string): void => console.error(line);

export function createLogger(level: LogLevel, sink: (line: string) => void = stderr): Logger {
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void => {
    if (RANK[at] < RANK[level]) return;
    sink(formatLine(at, message, fields));
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
  };
}

export function formatLine(level: string, message: string, fields?: LogFields): string {
  const parts = [`[viewquery] ${level.toUpperCase()} ${message}`];
  for (const [key, value] of Object.entries(fields ?? {})) {
    if (value === undefined) continue;
    parts.push(`${key}=${typeof value === 'string' || typeof value === 'object' ? JSON.stringify(value) : String(value)}`);
  }
  return parts.join(' ');
}
