export interface SanitizeLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const discard = (): void => {};

export const noopLogger: SanitizeLogger = {
  debug: discard,
  info: discard,
  warn: discard,
  error: discard,
};

/**
 * Console-backed logger with a fixed prefix.
 * Debug records go to console.debug so they can be filtered separately.
 */
export function createConsoleLogger(prefix: string): SanitizeLogger {
  const write =
    (method: 'debug' | 'log' | 'warn' | 'error') =>
    (message: string, data?: unknown): void => {
      if (data === undefined) console[method](`[${prefix}] ${message}`);
      else console[method](`[${prefix}] ${message}`, data);
    };

  return {
    debug: write('debug'),
    info: write('log'),
    warn: write('warn'),
    error: write('error'),
  };
}
