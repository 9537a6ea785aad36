/**
 * Logger the queue, the terminal connection and the Node terminal write to.
 * `StructuredLogger` and `NoopLogger` implement it; callers may pass their own.
 * @module
 */

/** `ctx` carries structured fields; `debug` is optional. */
export interface Logger {
  debug?(msg: string, ctx?: Record<string, unknown>): void;
  info(msg: string, ctx?: Record<string, unknown>): void;
  warn(msg: string, ctx?: Record<string, unknown>): void;
  error(msg: string, ctx?: Record<string, unknown>): void;
}
