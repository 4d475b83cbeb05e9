import winston from 'winston';
import * as path from 'path';
import fs from 'fs-extra';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    return JSON.stringify({
      timestamp,
      level,
      message,
      ...meta
    });
  })
);

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'sheetqa' },
  silent: process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined,
  transports: [],
});

if (process.env.NODE_ENV === 'production') {
  logger.add(new winston.transports.Console());
} else {
  logger.add(new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaString = Object.keys(meta).length ? JSON.stringify(meta) : '';
        return `${timestamp} ${level}: ${message} ${metaString}`;
      })
    )
  }));
}

// File transports only when LOG_DIR is set
const logsDir = process.env.LOG_DIR;
if (logsDir) {
  fs.ensureDirSync(logsDir);
  logger.add(new winston.transports.File({
    filename: path.join(logsDir, 'error.log'),
    level: 'error',
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5
  }));
  logger.add(new winston.transports.File({
    filename: path.join(logsDir, 'combined.log'),
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5
  }));
}

export const uploadLogger = logger.child({ component: 'upload' });
export const queryLogger = logger.child({ component: 'query' });
export const apiLogger = logger.child({ component: 'api' });
export const sessionLogger = logger.child({ component: 'session' });
