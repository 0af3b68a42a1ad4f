import pino from 'pino';
import { createWriteStream } from 'node:fs';
import type { LoggingOptions } from './config.ts';

// Store original console methods
const originalConsole = {
  log: console.log,
  info: console.info,
  warn: console.warn,
  error: console.error,
  debug: console.debug,
};

const format = (args: unknown[]): string =>
  args.map((arg) => (arg instanceof Error ? arg.stack ?? arg.message : String(arg))).join(' ');

export function initLogger(options: LoggingOptions): pino.Logger {
  const instance = pino(
    {
      level: options.level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    options.file
      ? createWriteStream(options.file, { flags: 'a' })
      : pino.transport({
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        })
  );

  // Route console output through pino so every module logs the same way
  console.log = (...args: unknown[]) => instance.info(format(args));
  console.info = (...args: unknown[]) => instance.info(format(args));
  console.warn = (...args: unknown[]) => instance.warn(format(args));
  console.error = (...args: unknown[]) => instance.error(format(args));
  console.debug = (...args: unknown[]) => instance.debug(format(args));

  instance.debug(`[logger] Writing to ${options.file ?? 'stdout'} at level ${options.level}`);
  return instance;
}

export function restoreConsole(): void {
  Object.assign(console, originalConsole);
}
