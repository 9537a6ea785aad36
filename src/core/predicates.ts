import { stripAnsi } from "../utils/ansi-strip.js";
import { type AcceptPredicate, type ResumeValue, TIMEOUT } from "./yields.js";

export interface OutputMatchOptions {
  /**
   * Also accept the TIMEOUT sentinel so a gated generator can recover when the
   * expected output never arrives. Defaults to true.
   */
  acceptTimeout?: boolean;
}

/**
 * Accept predicate matching subprocess output, after ANSI escapes are removed,
 * against a substring or regular expression.
 */
export function outputMatches(
  pattern: string | RegExp,
  options: OutputMatchOptions = {},
): AcceptPredicate {
  const acceptTimeout = options.acceptTimeout ?? true;
  return (value: ResumeValue) => {
    if (value === TIMEOUT) return acceptTimeout;
    if (typeof value !== "string") return false;
    const text = stripAnsi(value);
    if (typeof pattern === "string") return text.includes(pattern);
    pattern.lastIndex = 0;
    return pattern.test(text);
  };
}
