/**
 * Pipeline logging.
 *
 * Output goes to stderr so stdout stays free for rendered reports.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: chalk.gray('debug'),
  info: chalk.cyan('info '),
  warn: chalk.yellow('warn '),
  error: chalk.red('error'),
};

export interface ConsoleLoggerOptions {
  /** Minimum level written. Defaults to `info`. */
  level?: LogLevel;
  /** Defaults to process.stderr. */
  stream?: { write(chunk: string): unknown };
}

/**
 * Create a logger writing one tagged line per message.
 */
export function createConsoleLogger(opts?: ConsoleLoggerOptions): Logger {
  const threshold = LEVEL_ORDER[opts?.level ?? 'info'];
  const stream = opts?.stream ?? process.stderr;

  const write = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    stream.write(`${LEVEL_TAGS[level]} ${message}\n`);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

/** A logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
