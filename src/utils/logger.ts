import winston from 'winston';
import path from 'path';
import { errorMessage, errorStack } from './errors.js';

/**
 * Logger Configuration
 *
 * Structured logging for batch extraction runs. The human-readable progress
 * stream is printed separately (see ConcurrentRunner); these logs are for
 * diagnostics and land in logs/ as JSON.
 */

const isTestRun = process.env.NODE_ENV === 'test';

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

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ];

  if (!isTestRun) {
    transports.push(
      new winston.transports.File({
        filename: path.join(process.cwd(), 'logs', 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(process.cwd(), 'logs', 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return transports;
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'ConcurrentRunner', 'MetadataExtractor')
 */
export function createLogger(component: string): winston.Logger {
  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    silent: isTestRun,
    transports: buildTransports(),
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Helper to log batch events with a consistent batch id
 */
export class BatchLogger {
  private logger: winston.Logger;
  private batchId: string;

  constructor(batchId: string, component: string = `Batch:${batchId}`) {
    this.batchId = batchId;
    this.logger = createLogger(component);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { batchId: this.batchId, ...metadata });
  }

  error(message: string, error?: unknown, metadata?: object) {
    this.logger.error(message, {
      batchId: this.batchId,
      error: errorMessage(error),
      stack: errorStack(error),
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { batchId: this.batchId, ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { batchId: this.batchId, ...metadata });
  }

  started(metadata?: object) {
    this.info('Batch started', metadata);
  }

  completed(metadata?: object) {
    this.info('Batch completed', metadata);
  }

  failed(error: unknown, metadata?: object) {
    this.error('Batch failed', error, metadata);
  }
}
