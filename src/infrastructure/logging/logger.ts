import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from '../config/index.js';

export interface LoggerOptions {
  readonly level: LogLevel;
  /** Human-readable output through pino-pretty. Defaults to whether stderr is a terminal. */
  readonly pretty?: boolean;
}

/**
 * Logger for the command-line program.
 *
 * Writes to stderr (fd 2) so that stdout carries only command output
 * (statistics, filtered lines).
 */
export function createLogger(options: LoggerOptions): Logger {
  const pretty = options.pretty ?? process.stderr.isTTY === true;

  if (pretty) {
    return pino({
      level: options.level,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({ level: options.level }, pino.destination(2));
}
