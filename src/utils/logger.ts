import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for the extraction and parsing pipeline.
 * LOG_LEVEL picks the level, LOG_DIR the file location, LOG_SILENT mutes everything.
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

/**
 * Create a logger instance
 * @param component Component name (e.g., 'RequestScheduler', 'ExtractionParser')
 */
export function createLogger(component: string): winston.Logger {
  const silent = process.env.LOG_SILENT === 'true';
  const logDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');

  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ];

  // File transports create their directory on first write, keep them off when muted
  if (!silent) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    silent,
    transports,
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Component-scoped logger with consistent metadata
 */
export class ComponentLogger {
  private logger: winston.Logger;
  private scope: string;

  constructor(scope: string) {
    this.scope = scope;
    this.logger = createLogger(scope);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { scope: this.scope, ...metadata });
  }

  error(message: string, error?: Error | unknown, metadata?: object) {
    this.logger.error(message, {
      scope: this.scope,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { scope: this.scope, ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { scope: this.scope, ...metadata });
  }

  started(metadata?: object) {
    this.info('Started', metadata);
  }

  completed(metadata?: object) {
    this.info('Completed', metadata);
  }

  failed(error: Error | unknown, metadata?: object) {
    this.error('Failed', error, metadata);
  }
}
