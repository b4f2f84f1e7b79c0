/**
 * Logger module - structured logging, with optional file rotation
 */

import pino, { Logger, LoggerOptions } from 'pino';
import * as path from 'path';

// Under jest (NODE_ENV=test) stay quiet unless LOG_LEVEL asks otherwise
const level = process.env.LOG_LEVEL
  || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');

const options: LoggerOptions = {
  level,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
};

function buildLogger(): Logger {
  const logDir = process.env.LOG_DIR;
  if (!logDir) {
    return pino(options);
  }

  return pino({
    ...options,
    transport: {
      target: 'pino-roll',
      options: {
        file: path.join(logDir, 'receiver.log'),
        size: process.env.LOG_MAX_SIZE || '100m',
        frequency: process.env.LOG_FREQUENCY || 'daily',
        limit: { count: parseInt(process.env.LOG_MAX_FILES || '7', 10) },
        mkdir: true,
      },
    },
  });
}

export const logger = buildLogger();

// Create child loggers for different modules
export const createLogger = (name: string): Logger => {
  return logger.child({ module: name });
};

export type { Logger };

export default logger;
