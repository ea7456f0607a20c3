import pino from 'pino';
import type { Config } from '../config.js';

const isProduction = process.env.NODE_ENV === 'production';

export function createLogger(config: Pick<Config, 'logging'>) {
  if (isProduction) {
    return pino({
      name: 'todo-export',
      level: config.logging.level,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }

  // Progress notices are meant for a terminal, so keep them readable
  return pino({
    level: config.logging.level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  });
}

export type Logger = ReturnType<typeof createLogger>;

/**
 * Logger that drops everything. Used where output would only be noise.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
