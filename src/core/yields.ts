/**
 * The resume/yield protocol shared by every generator an InteractionQueue drives.
 *
 * A generator is resumed with a {@link ResumeValue} and answers with a
 * {@link Yielded} value telling the queue what to send and how to wait.
 * @module
 */

import { InvalidYieldError } from "../errors.js";

/** Delivered when the subprocess did not answer within the timeout bound. */
export const TIMEOUT: unique symbol = Symbol("termqueue.timeout");
/** Delivered right after a fire-and-forget send. */
export const SENT: unique symbol = Symbol("termqueue.sent");

export type ResumeValue = string | typeof TIMEOUT | typeof SENT | undefined;

/** Gate evaluated against each resume value before the generator may continue. */
export type AcceptPredicate = (value: ResumeValue) => boolean;

export interface KeepWaiting {
  readonly kind: "keep-waiting";
}

export interface FireAndForget {
  readonly kind: "fire-and-forget";
  readonly text: string;
}

export interface WaitUntil {
  readonly kind: "until";
  readonly text: string;
  readonly accept: AcceptPredicate;
}

/** A plain string means: send it, then wait for any response. */
export type Yielded = string | KeepWaiting | FireAndForget | WaitUntil;

export interface PlainSend {
  readonly kind: "send";
  readonly text: string;
}

export type ClassifiedYield = KeepWaiting | FireAndForget | WaitUntil | PlainSend;

/**
 * Anything the queue can drive. Native generators typed
 * `Generator<Yielded, void, ResumeValue>` satisfy this, as does `Interaction`.
 */
export interface Resumable {
  next(value: ResumeValue): IteratorResult<Yielded, unknown>;
  return(value?: undefined): IteratorResult<Yielded, unknown>;
}

const KEEP_WAITING: KeepWaiting = Object.freeze({ kind: "keep-waiting" });

export function keepWaiting(): KeepWaiting {
  return KEEP_WAITING;
}

export function fireAndForget(text: string): FireAndForget {
  return { kind: "fire-and-forget", text };
}

export function sendUntil(text: string, accept: AcceptPredicate): WaitUntil {
  return { kind: "until", text, accept };
}

/** Validate a yielded value. Throws InvalidYieldError for anything outside the protocol. */
export function classifyYield(value: Yielded): ClassifiedYield {
  if (typeof value === "string") {
    if (value !== "") return { kind: "send", text: value };
    throw new InvalidYieldError(value);
  }
  if (typeof value !== "object" || value === null) {
    throw new InvalidYieldError(value);
  }
  switch (value.kind) {
    case "keep-waiting":
      return value;
    case "fire-and-forget":
      if (isText(value.text)) return value;
      break;
    case "until":
      if (isText(value.text) && typeof value.accept === "function") return value;
      break;
  }
  throw new InvalidYieldError(value);
}

export function describeResumeValue(value: ResumeValue): string {
  if (value === TIMEOUT) return "timeout";
  if (value === SENT) return "sent";
  if (value === undefined) return "none";
  return `output(${value.length})`;
}

function isText(text: unknown): text is string {
  return typeof text === "string" && text !== "";
}
