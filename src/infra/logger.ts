import winston from 'winston';
import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Find project root to place logs correctly
function findProjectRoot(): string {
  let currentDir = __dirname;
  while (currentDir !== path.dirname(currentDir)) {
    if (fs.existsSync(path.join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }
  return __dirname;
}

export type LogContext = Record<string, unknown>;

export interface ILogger {
  info(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export interface WinstonLoggerOptions {
  level?: string;
  logsDir?: string;
}

export class WinstonLogger implements ILogger {
  private logger: winston.Logger;
  private static sharedLogger: winston.Logger | null = null;

  constructor(options: WinstonLoggerOptions = {}) {
    // Use a shared logger instance so concurrent sessions append to the same file
    if (!WinstonLogger.sharedLogger) {
      const logsDir = options.logsDir ?? path.join(findProjectRoot(), 'logs');
      if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
      }

      WinstonLogger.sharedLogger = winston.createLogger({
        level: options.level ?? 'info',
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json()
        ),
        transports: [
          new winston.transports.Console({
            format: winston.format.combine(
              winston.format.colorize(),
              winston.format.printf(({ timestamp, level, message, ...meta }) => {
                return `${timestamp} [${level}]: ${message} ${Object.keys(meta).length ? JSON.stringify(meta) : ''}`;
              })
            ),
          }),
          new winston.transports.File({
            filename: path.join(logsDir, 'regflow.log'),
            level: 'debug',
            options: { flags: 'a' }
          }),
        ],
      });

      WinstonLogger.sharedLogger.on('error', (err) => {
        console.error('Winston logger error:', err);
      });
    }

    this.logger = WinstonLogger.sharedLogger;
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (error instanceof Error) {
      this.logger.error(message, {
        ...context,
        errorMessage: error.message,
        stack: error.stack,
      });
    } else if (error !== undefined) {
      this.logger.error(message, { ...context, error });
    } else {
      this.logger.error(message, context);
    }
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context);
  }
}

export class LoggerStub implements ILogger {
  info(_message: string, _context?: LogContext): void {}
  error(_message: string, _error?: unknown, _context?: LogContext): void {}
  warn(_message: string, _context?: LogContext): void {}
  debug(_message: string, _context?: LogContext): void {}
}

/**
 * Prefixes every line with a fixed context (e.g. the session id).
 */
export class ScopedLogger implements ILogger {
  constructor(private inner: ILogger, private scope: LogContext) {}

  info(message: string, context?: LogContext): void {
    this.inner.info(message, { ...this.scope, ...context });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.inner.error(message, error, { ...this.scope, ...context });
  }

  warn(message: string, context?: LogContext): void {
    this.inner.warn(message, { ...this.scope, ...context });
  }

  debug(message: string, context?: LogContext): void {
    this.inner.debug(message, { ...this.scope, ...context });
  }
}
