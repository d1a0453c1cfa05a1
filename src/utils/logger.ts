import pino, { type Logger } from 'pino';

/**
 * Application logger using Pino
 *
 * JSON lines in production, pretty printed during local development.
 * Tests run with LOG_LEVEL=silent (see vitest.config.ts).
 */

const env = process.env.NODE_ENV || 'development';
const usePretty = env !== 'production' && env !== 'test';

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',

  transport: usePretty ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
    },
  } : undefined,

  base: { env },
});

/**
 * Create a child logger carrying component context
 */
export function createLogger(context: Record<string, string>): Logger {
  return logger.child(context);
}
