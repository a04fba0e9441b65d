/**
 * Logger
 *
 * Pino-based structured logger shared by every package.
 * Packages take a Logger through their constructors; `logger` is only the
 * fallback when nothing is injected.
 */

import { pino, destination, type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type Logger = PinoLogger;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  level?: LogLevel | 'silent';
  service?: string;
  env?: string;
  // Write JSON lines to this file instead of stdout
  file?: string;
  // Append to `file` instead of truncating it on start
  keepLogs?: boolean;
}

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

function baseOptions(config: LoggerConfig): LoggerOptions {
  return {
    level: config.level ?? LOG_LEVEL,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service ?? 'capture-relay',
      env: config.env ?? NODE_ENV,
    },
  };
}

/**
 * Build a root logger.
 *
 * A configured file wins over everything else. Pretty output is only used in
 * development when stdout is a terminal.
 */
export function buildLogger(config: LoggerConfig = {}): Logger {
  const options = baseOptions(config);

  if (config.file) {
    return pino(options, destination({
      dest: config.file,
      append: config.keepLogs ?? false,
      mkdir: true,
      sync: false,
    }));
  }

  const env = config.env ?? NODE_ENV;
  if (env === 'development' && process.stdout.isTTY) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(options);
}

export const logger = buildLogger();

/**
 * Create a child logger with additional context
 */
export function createLogger(
  context: Record<string, unknown>,
  parent: Logger = logger
): Logger {
  return parent.child(context);
}

/**
 * Logger that drops everything; handy for tests and dry runs
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
