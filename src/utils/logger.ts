import { env, LogLevel } from '../config/env';

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

type LogMethod = (message: string, meta?: unknown) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

function serializeError(error: Error): Record<string, unknown> {
  return { name: error.name, message: error.message, stack: error.stack };
}

/**
 * Format meta as a JSON suffix. Errors are expanded since JSON.stringify
 * drops their non-enumerable fields.
 */
export function formatMeta(meta?: unknown): string {
  if (meta === undefined) {
    return '';
  }
  if (meta instanceof Error) {
    return ' ' + JSON.stringify(serializeError(meta));
  }
  if (typeof meta === 'object' && meta !== null) {
    const entries = Object.entries(meta);
    if (entries.length === 0) {
      return '';
    }
    const normalized = Object.fromEntries(
      entries.map(([key, value]) => [key, value instanceof Error ? serializeError(value) : value])
    );
    return ' ' + JSON.stringify(normalized);
  }
  return ' ' + JSON.stringify(meta);
}

function log(level: Exclude<LogLevel, 'silent'>, message: string, meta?: unknown): void {
  if (LEVEL_VALUES[level] < LEVEL_VALUES[env.LOG_LEVEL]) {
    return;
  }

  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  switch (level) {
    case 'debug':
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

export const logger: Logger = {
  debug: (message, meta) => log('debug', message, meta),
  info: (message, meta) => log('info', message, meta),
  warn: (message, meta) => log('warn', message, meta),
  error: (message, meta) => log('error', message, meta)
};
