import pino, { LevelWithSilent, Logger } from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';
const defaultLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

export const logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel,
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    service: 'certificate-alignment',
    env: process.env.NODE_ENV,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
});

export type { Logger };

// Children copy their level when created, so level changes are pushed to each one
const moduleLoggers: Logger[] = [];

export function createLogger(module: string): Logger {
  const child = logger.child({ module });
  moduleLoggers.push(child);
  return child;
}

export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
  for (const child of moduleLoggers) {
    child.level = level;
  }
}
