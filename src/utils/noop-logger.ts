import type { Logger } from "../interfaces/logger.js";

/** Logger that discards everything. Queue, connection and terminal default to it. */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export const noopLogger: Logger = new NoopLogger();
