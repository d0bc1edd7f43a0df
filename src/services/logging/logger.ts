import path from 'path';
import winston from 'winston';
import { format } from 'winston';

const { combine, timestamp, printf, colorize } = format;

const FILE_MAX_SIZE = 5242880; // 5MB
const FILE_MAX_FILES = 5;

const logFormat = printf(({ level, message, timestamp, ...metadata }) => {
  const metaString = Object.keys(metadata).length
    ? `\n${JSON.stringify(metadata, null, 2)}`
    : '';

  return `${timestamp} ${level}: ${message}${metaString}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: combine(timestamp(), colorize(), logFormat),
  transports: [new winston.transports.Console()],
});

export interface LoggerOptions {
  level: string;
  logDir?: string;
  silent?: boolean;
}

export function configureLogger({ level, logDir, silent }: LoggerOptions): winston.Logger {
  logger.level = level;
  if (silent !== undefined) {
    logger.silent = silent;
  }

  if (logDir) {
    logger.add(
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: FILE_MAX_SIZE,
        maxFiles: FILE_MAX_FILES,
      })
    );
    logger.add(
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: FILE_MAX_SIZE,
        maxFiles: FILE_MAX_FILES,
      })
    );
  }

  return logger;
}

export function childLogger(component: string): winston.Logger {
  return logger.child({ component });
}
