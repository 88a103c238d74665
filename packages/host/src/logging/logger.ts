// ─── Logger ────────────────────────────────────────────────────────
// Tagged console logging for the host collaborators. Every class takes
// a FormulaLogger so embedders can route or silence its messages.

export interface FormulaLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Logs to the console with a `[Tag]` prefix. */
export function createConsoleLogger(tag: string): FormulaLogger {
  return {
    log: (message) => console.log(`[${tag}] ${message}`),
    warn: (message) => console.warn(`[${tag}] ${message}`),
    error: (message) => console.error(`[${tag}] ${message}`),
  };
}

const discard = (): void => undefined;

/** Drops every message. */
export const silentLogger: FormulaLogger = {
  log: discard,
  warn: discard,
  error: discard,
};

/** Message text of anything thrown. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
