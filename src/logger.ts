import pino, { Logger } from 'pino';
import { AppConfig, LogLevel } from './types';

interface LoggerOptions {
  level?: LogLevel;
}

export function createLogger(config: AppConfig, options: LoggerOptions = {}): Logger {
  const level = options.level ?? config.logLevel;

  // stdout carries the JSON result of `classes` and `extract`; logs go to stderr.
  if (process.stderr.isTTY) {
    return pino({
      name: 'lsf-classes',
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino({ name: 'lsf-classes', level }, pino.destination(2));
}
