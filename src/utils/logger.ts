import * as winston from 'winston';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `[${String(timestamp)}] [${level.toUpperCase()}] ${String(message)}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    if (stack) {
      log += `\n${String(stack)}`;
    }
    return log;
  })
);

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Thin wrapper over a winston logger with a fixed console format.
 * Silent under the test runner.
 */
class Logger {
  private logger: winston.Logger;

  constructor(level: LogLevel = 'info') {
    this.logger = winston.createLogger({
      level,
      format: logFormat,
      silent: process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined,
      transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
    });
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  /**
   * Log an error object with its stack
   */
  logError(error: unknown, context?: string): void {
    if (error instanceof Error) {
      this.error(context ? `${context}: ${error.message}` : error.message, {
        name: error.name,
        stack: error.stack,
      });
    } else {
      this.error(context ? `${context}: ${String(error)}` : String(error));
    }
  }
}

const envLevel = process.env.LOG_LEVEL;
const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');

export { logger, LOG_LEVELS };
