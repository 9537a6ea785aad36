export class TermQueueError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TermQueueError";
    this.code = code;
  }
}

// ── Domain errors ──

/** A generator yielded a value outside the queue protocol. */
export class InvalidYieldError extends TermQueueError {
  readonly yielded: unknown;

  constructor(yielded: unknown, options?: ErrorOptions) {
    super(`Invalid yielded value: ${describeValue(yielded)}`, "INVALID_YIELD", options);
    this.name = "InvalidYieldError";
    this.yielded = yielded;
  }
}

/** An interaction was resumed after it had been closed. */
export class InteractionClosedError extends TermQueueError {
  constructor(label: string, options?: ErrorOptions) {
    super(`Interaction "${label}" resumed after close`, "INTERACTION_CLOSED", options);
    this.name = "InteractionClosedError";
  }
}

export class ProcessError extends TermQueueError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PROCESS", options);
    this.name = "ProcessError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to TermQueueError (preserves cause chain). */
export function toTermQueueError(value: unknown): TermQueueError {
  if (value instanceof TermQueueError) return value;
  if (value instanceof Error) return new TermQueueError(value.message, "UNKNOWN", { cause: value });
  return new TermQueueError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

function describeValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "symbol") return value.toString();
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
