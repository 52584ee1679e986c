/**
 * Minimal logging contract. Hosts pass their own logger; the library never
 * writes to the console by itself.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export const noopLogger: Logger = {
  debug() {},
  warn() {},
  error() {},
};
