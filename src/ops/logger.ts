import pino from 'pino';
import { env } from '../config/env.js';

export const loggerOptions: pino.LoggerOptions = {
  level: env.LOG_LEVEL || 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { service: 'stream-chat-translator' },
  // Records carry failures under `error`; pino only serializes `err` by default.
  serializers: { error: pino.stdSerializers.err, err: pino.stdSerializers.err }
};

export const logger = pino(loggerOptions);

const stringifyArg = (arg: unknown): string => {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return `${arg.name}: ${arg.message}`;

  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
};

type ConsoleMethod = 'log' | 'info' | 'warn' | 'error' | 'debug';

const bindConsole = (method: ConsoleMethod, logMethod: (msg: string) => void): void => {
  console[method] = (...args: unknown[]): void => {
    logMethod(args.map(stringifyArg).join(' '));
  };
};

let patched = false;

/**
 * Routes console output through pino so the `[Tag] message` lines written by
 * commands and channels end up in the same JSON stream as structured records.
 */
export const setupStructuredLogging = (): void => {
  if (patched) return;
  patched = true;

  bindConsole('log', (msg) => logger.info(msg));
  bindConsole('info', (msg) => logger.info(msg));
  bindConsole('warn', (msg) => logger.warn(msg));
  bindConsole('error', (msg) => logger.error(msg));
  bindConsole('debug', (msg) => logger.debug(msg));
};
