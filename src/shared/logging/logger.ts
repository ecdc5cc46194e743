import pino, { LoggerOptions } from 'pino';
import { config } from '../config/env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const options: LoggerOptions = {
  name: 'ensemble-hub',
  level: config.LOG_LEVEL,
  base: { env: config.NODE_ENV },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
  redact: {
    paths: ['headers.authorization', '*.headers.authorization', '*.apiKey', '*.token', '*.secret'],
    censor: '[redacted]',
  },
};

if (!config.isTest) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
      translateTime: 'SYS:HH:MM:ss.l',
    },
  };
}

export const logger = pino(options);

/** Apply the level from the agents file once it is loaded; env `LOG_LEVEL` covers startup. */
export function setLogLevel(level: LogLevel): void {
  if (logger.level === level) return;
  logger.level = level;
  logger.debug({ level }, 'Log level changed');
}

export interface RequestLogBindings {
  requestId: string;
  [key: string]: unknown;
}

export const childLogger = (bindings: RequestLogBindings) => logger.child(bindings);
