import type { Logger, LogContext } from '../../domain/ports/Logger.js';

function write(sink: (...args: unknown[]) => void, message: string, context?: LogContext): void {
  if (context && Object.keys(context).length > 0) {
    sink(`[keybatch] ${message}`, context);
  } else {
    sink(`[keybatch] ${message}`);
  }
}

/** Logger that writes through the global `console`. */
export const consoleLogger: Logger = {
  debug: (message, context) => {
    write(console.debug, message, context);
  },
  info: (message, context) => {
    write(console.info, message, context);
  },
  warn: (message, context) => {
    write(console.warn, message, context);
  },
  error: (message, context) => {
    write(console.error, message, context);
  },
};

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
