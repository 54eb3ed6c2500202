/**
 * Logger — Winston-based, console on stderr plus optional log files
 *
 * stdout is reserved for command output (previews, word data), so every
 * console level goes to stderr.
 */

import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import type { LogLevel, Logger } from '../core/types.js';

export interface LoggerOptions {
  level?: LogLevel;
  logDir?: string;
  silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const consoleTransport = new winston.transports.Console({
    stderrLevels: ['error', 'warn', 'info', 'debug'],
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} [${level}] ${message}${metaStr}`;
      })
    ),
  });

  const files = [];
  if (options.logDir) {
    if (!existsSync(options.logDir)) {
      mkdirSync(options.logDir, { recursive: true });
    }
    files.push(
      new winston.transports.File({
        filename: `${options.logDir}/error.log`,
        level: 'error',
      }),
      new winston.transports.File({
        filename: `${options.logDir}/combined.log`,
      }),
    );
  }

  const logger = winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports: [consoleTransport, ...files],
  });

  return {
    info: (msg, meta) => logger.info(msg, meta),
    warn: (msg, meta) => logger.warn(msg, meta),
    error: (msg, meta) => logger.error(msg, meta),
    debug: (msg, meta) => logger.debug(msg, meta),
  };
}
