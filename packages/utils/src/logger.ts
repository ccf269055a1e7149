/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output, log rotation,
 * and context propagation.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';
import { LOG_LEVELS, type LogLevel } from './config/schema.js';

// Log context interface
export interface LogContext {
  requestId?: string;
  modelId?: number;
  versionNumber?: number;
  [key: string]: unknown;
}

interface LoggerConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level to start with before the configuration is loaded. Values winston does
 * not know fall back to the default instead of disabling every transport.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (isLogLevel(env.LOG_LEVEL)) {
    return env.LOG_LEVEL;
  }
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

const defaultConfig: LoggerConfig = {
  level: resolveLogLevel(),
  enableConsole: process.env.LOG_CONSOLE !== 'false',
  enableFile: process.env.LOG_FILE !== 'false' && process.env.NODE_ENV !== 'test',
  logDir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  maxFiles: process.env.LOG_MAX_FILES || '14d',
  maxSize: process.env.LOG_MAX_SIZE || '20m',
};

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [];

// Transports that follow the logger's level (the error file stays at error)
const levelledTransports: winston.transport[] = [];

if (defaultConfig.enableConsole) {
  const consoleTransport = new winston.transports.Console({
    format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
    level: defaultConfig.level,
  });
  transports.push(consoleTransport);
  levelledTransports.push(consoleTransport);
}

if (defaultConfig.enableFile) {
  fs.mkdirSync(defaultConfig.logDir, { recursive: true });

  transports.push(
    new DailyRotateFile({
      filename: path.join(defaultConfig.logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );

  transports.push(
    new DailyRotateFile({
      filename: path.join(defaultConfig.logDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );
}

// Winston needs at least one transport or it warns on every write
if (transports.length === 0) {
  transports.push(new winston.transports.Console({ silent: true }));
}

const winstonLogger = winston.createLogger({
  level: defaultConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'modelvault' },
  transports,
  exitOnError: false,
});

/**
 * Apply the validated LOG_LEVEL once the configuration is loaded
 */
export function setLogLevel(level: LogLevel): void {
  winstonLogger.level = level;
  for (const transport of levelledTransports) {
    transport.level = level;
  }
}

export function getLogLevel(): LogLevel {
  return isLogLevel(winstonLogger.level) ? winstonLogger.level : defaultConfig.level;
}

// Logger with package namespacing
class Logger {
  private readonly namespace: string;

  constructor(namespace = 'modelvault') {
    this.namespace = namespace;
  }

  private mergeContext(context?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...context,
    };
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }
}

export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export const logger = new Logger('modelvault');

export { Logger };
