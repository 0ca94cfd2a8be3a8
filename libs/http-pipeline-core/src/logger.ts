import type { Logger, LoggerMeta } from './types';

/**
 * Console logger used when no logger is injected.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    meta ? console.debug(message, meta) : console.debug(message);
  }
  info(message: string, meta?: LoggerMeta): void {
    meta ? console.info(message, meta) : console.info(message);
  }
  warn(message: string, meta?: LoggerMeta): void {
    meta ? console.warn(message, meta) : console.warn(message);
  }
  error(message: string, meta?: LoggerMeta): void {
    meta ? console.error(message, meta) : console.error(message);
  }
}

export const noopLogger: Logger = {
  debug: () => {
    /* no-op */
  },
  info: () => {
    /* no-op */
  },
  warn: () => {
    /* no-op */
  },
  error: () => {
    /* no-op */
  },
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
