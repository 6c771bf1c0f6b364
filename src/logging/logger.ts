/**
 * Logging Infrastructure
 *
 * Configurable Winston logging shared by brokers and the event bus:
 * - Multiple log levels (error, warn, info, debug)
 * - Colored console output (unless noColor is set)
 * - Optional file logging
 * - Environment variable configuration (CHANNEL_BUS_LOG_LEVEL)
 */

import winston from 'winston';
import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: LogLevel;
  noColor?: boolean;
  verbose?: boolean;
  /** Append log lines to this file in addition to (or instead of) the console */
  filePath?: string;
  consoleOutput?: boolean;
  /** Drop every log line; used by tests */
  silent?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Custom formatter for console output with chalk colors
 */
export const consoleFormat = (noColor: boolean) => winston.format.printf(({ level, message, timestamp }) => {
  if (noColor) {
    return `[${timestamp}] ${level.toUpperCase()}: ${message}`;
  }

  const colorMap: Record<string, (text: string) => string> = {
    error: chalk.red,
    warn: chalk.yellow,
    info: chalk.blue,
    debug: chalk.gray,
  };

  const colorFn = colorMap[level] || ((text: string) => text);
  const levelText = colorFn(level.toUpperCase());
  const timeText = chalk.gray(`[${timestamp}]`);

  return `${timeText} ${levelText}: ${message}`;
});

/**
 * Create a configured logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.CHANNEL_BUS_LOG_LEVEL;
  const {
    level = isLogLevel(envLevel) ? envLevel : 'info',
    noColor = false,
    verbose = false,
    filePath,
    consoleOutput = true,
    silent = false,
  } = options;

  // Override level if verbose is enabled
  const effectiveLevel = verbose ? 'debug' : level;

  const transports: winston.transport[] = [];
  if (consoleOutput) {
    transports.push(
      new winston.transports.Console({
        format: consoleFormat(noColor),
      })
    );
  }
  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        format: consoleFormat(true),
      })
    );
  }
  // winston warns when it has nowhere to write
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level: effectiveLevel,
    silent,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.errors({ stack: true }),
    ),
    transports,
  });
}

// Global logger instance (initialized by the embedding application)
let globalLogger: Logger | null = null;

/**
 * Initialize the global logger
 */
export function initLogger(options: LoggerOptions = {}): Logger {
  globalLogger = createLogger(options);
  return globalLogger;
}

/**
 * Get the global logger instance
 * Creates a default logger if not initialized
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

/**
 * Render an unknown thrown value for a log line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
