import { pino, type Logger, type LoggerOptions } from 'pino';

const isDev = process.env['NODE_ENV'] !== 'production';
const level = process.env['RELIEF_LOG_LEVEL'] ?? (isDev ? 'debug' : 'info');

// Build options conditionally to satisfy exactOptionalPropertyTypes
const options: LoggerOptions = {
  level,
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Pretty output only for interactive development runs
if (isDev && level !== 'silent') {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pino(options);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
