import { pino, type Logger, type LoggerOptions } from 'pino';

const nodeEnv = process.env['NODE_ENV'];
const isDev = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

function defaultLevel(): string {
  if (isTest) return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
}

const options: LoggerOptions = {
  level: process.env['TASKLOOM_LOG_LEVEL'] ?? defaultLevel(),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Pretty output only for interactive development
if (isDev) {
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
