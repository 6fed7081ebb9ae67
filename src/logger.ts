// ── Logging ──────────────────────────────────────────────────────────────────
//
// Diagnostics go to stderr so the tool stays quiet on stdout.

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.error(message),
  warn: (message) => console.error(`warning: ${message}`),
  error: (message) => console.error(`error: ${message}`),
};
