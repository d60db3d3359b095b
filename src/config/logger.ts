/**
 * Winston Logger Configuration
 *
 * Structured JSON logging for the cleanup run. Every module logs through this
 * shared instance with a message prefix naming the component and a metadata object.
 *
 * The console transport echoes decisions for interactive and cron use; a day-wise
 * file transport is added when a log directory is configured.
 */

import path from 'path';
import winston from 'winston';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const SERVICE_NAME = 'cluster-auto-cleanup';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleTransport = new winston.transports.Console({
  stderrLevels: ['error', 'warn'],
});

const envLevel = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';

export const logger = winston.createLogger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  defaultMeta: { service: SERVICE_NAME },
  format: jsonFormat,
  transports: [consoleTransport],
});

export interface LoggerOptions {
  level: LogLevel;
  quiet: boolean;
  logDir?: string;
  runId?: string;
  date?: Date;
}

/**
 * auto-cleanup-YYYY-MM-DD.log
 */
export function logFileName(date: Date): string {
  return `auto-cleanup-${date.toISOString().slice(0, 10)}.log`;
}

export function configureLogger(options: LoggerOptions): void {
  logger.level = options.level;
  consoleTransport.level = options.quiet ? 'warn' : options.level;

  if (options.runId) {
    logger.defaultMeta = { service: SERVICE_NAME, runId: options.runId };
  }

  if (options.logDir) {
    logger.add(
      new winston.transports.File({
        filename: path.join(options.logDir, logFileName(options.date ?? new Date())),
        level: options.level,
      })
    );
  }
}
