import { errorMessage } from './errors.js';

/**
 * Line-oriented logger shared by the server components.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

function stamp(message: string): string {
  return `[${new Date().toISOString()}] ${message}`;
}

/**
 * Logger writing timestamped lines to stdout (info) and stderr (warn, error).
 */
export function createConsoleLogger(): Logger {
  return {
    info(message: string): void {
      console.log(stamp(message));
    },
    warn(message: string): void {
      console.warn(stamp(message));
    },
    error(message: string, error?: unknown): void {
      if (error === undefined) {
        console.error(stamp(message));
      } else {
        console.error(stamp(message), errorMessage(error));
      }
    },
  };
}
