/**
 * Pluggable logger used by the client and its requests.
 */

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const PREFIX = '[restpoll]';

function write(sink: (...args: unknown[]) => void, message: string, meta?: LogMeta): void {
  if (meta) {
    sink(PREFIX, message, meta);
  } else {
    sink(PREFIX, message);
  }
}

/**
 * Default logger. Debug messages are dropped; pass your own logger to see them.
 */
export const consoleLogger: Logger = {
  debug: () => undefined,
  info: (message, meta) => write(console.info, message, meta),
  warn: (message, meta) => write(console.warn, message, meta),
  error: (message, meta) => write(console.error, message, meta),
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
