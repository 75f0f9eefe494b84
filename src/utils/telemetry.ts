import pino from 'pino';

const BASE_LEVEL = process.env.LOG_LEVEL ?? 'info';
const IS_TEST = process.env.NODE_ENV === 'test' || process.argv.includes('--test');

export type Logger = pino.Logger;

export function createLogger(name: string, bindings?: Record<string, unknown>): Logger {
  const logger = pino({
    name,
    level: BASE_LEVEL,
    enabled: !IS_TEST || Boolean(process.env.LOG_LEVEL),
    transport:
      process.env.NODE_ENV === 'production' || IS_TEST
        ? undefined
        : {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard'
            }
          }
  });
  return bindings ? logger.child(bindings) : logger;
}
