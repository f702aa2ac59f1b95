// --- Debug Logger Utility ---
const IS_DEBUG_MODE = Boolean(
  process.env.DEBUG && process.env.DEBUG !== 'false' && process.env.DEBUG !== '0',
);

export type DebugLogger = (...args: unknown[]) => void;

export function isDebugMode(): boolean {
  return IS_DEBUG_MODE;
}

/**
 * Returns a logger that writes `PREFIX: ...` to stderr when DEBUG is set.
 */
export function createDebugLogger(prefix: string): DebugLogger {
  return (...args: unknown[]): void => {
    if (IS_DEBUG_MODE) {
      console.error(`${prefix}:`, ...args);
    }
  };
}
// --- End Debug Logger Utility ---
