import { fireAndForget, type ResumeValue, type Yielded } from "./yields.js";

export interface OneShotOptions {
  /** Send without waiting for a response; the queue moves on immediately. */
  fireAndForget?: boolean;
}

/** A generator that sends `text` once and completes on the next resume. */
export function* oneShot(
  text: string,
  options: OneShotOptions = {},
): Generator<Yielded, void, ResumeValue> {
  yield options.fireAndForget ? fireAndForget(text) : text;
}
