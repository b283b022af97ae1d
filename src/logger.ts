/**
 * Leveled logger for cardpack components.
 *
 * Lines go to stderr so stdout stays clean for pack output and the MCP stdio
 * transport.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, string | number | boolean | null | undefined | string[]>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const levelColors = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  write?: (line: string) => void;
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return '';

  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const rendered = Array.isArray(value) ? `[${value.join(',')}]` : String(value);
    parts.push(`${key}=${rendered}`);
  }

  return parts.length > 0 ? ' ' + parts.join(' ') : '';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));
  const scope = options.scope ? chalk.dim(`[${options.scope}] `) : '';

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const tag = levelColors[level](level.toUpperCase().padEnd(5));
    write(`${tag} ${scope}${message}${chalk.dim(formatFields(fields))}`);
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
  };
}

/**
 * Prefix every message of an existing logger with a component name
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  const prefix = `[${scope}] `;
  return {
    debug: (message, fields) => logger.debug(prefix + message, fields),
    info: (message, fields) => logger.info(prefix + message, fields),
    warn: (message, fields) => logger.warn(prefix + message, fields),
    error: (message, fields) => logger.error(prefix + message, fields),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
