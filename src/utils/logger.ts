import { pino, destination, type Logger, type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const isDev = env !== 'production' && env !== 'test';

// Build options conditionally to satisfy exactOptionalPropertyTypes
const options: LoggerOptions = {
  level: process.env['PLAN_DIGEST_LOG_LEVEL'] ?? (isDev ? 'debug' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// stdout belongs to command output (--json), so logs always go to stderr
if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
      destination: 2,
    },
  };
}

export const logger: Logger = isDev ? pino(options) : pino(options, destination(2));

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
