/**
 * Ready-made interactions for line-oriented subprocesses: run a command and
 * collect its output until a prompt appears, or send text and wait for a
 * specific reply.
 * @module
 */

import type { Logger } from "../interfaces/logger.js";
import { stripAnsi } from "../utils/ansi-strip.js";
import { noopLogger } from "../utils/noop-logger.js";
import { INTERACTION_DONE, Interaction } from "./interaction.js";
import { outputMatches } from "./predicates.js";
import {
  keepWaiting,
  type ResumeValue,
  SENT,
  sendUntil,
  TIMEOUT,
  type Yielded,
} from "./yields.js";

/** Buffer a command interaction writes its output into. */
export interface CommandTranscript {
  readonly command: string;
  readonly chunks: string[];
  attempts: number;
  timedOut: boolean;
  finished: boolean;
}

export interface CommandResult {
  command: string;
  /** Everything the subprocess printed in reply, escapes included. */
  output: string;
  attempts: number;
  timedOut: boolean;
  /** True when the queue was cancelled before the command finished. */
  cancelled: boolean;
}

export interface CommandInteractionOptions {
  command: string;
  /**
   * Output that marks the command as finished, matched against everything
   * received so far. Without a prompt the first (debounced) reply finishes it.
   */
  prompt?: string | RegExp;
  /** How many times to re-send the command after a timeout. Default 0. */
  retries?: number;
  /** Line terminator appended to the command. Default "\n". */
  newline?: string;
  onComplete?: (result: CommandResult) => void;
  logger?: Logger;
}

export function createTranscript(command: string): CommandTranscript {
  return { command, chunks: [], attempts: 0, timedOut: false, finished: false };
}

export function commandInteraction(
  options: CommandInteractionOptions,
): Interaction<CommandTranscript> {
  const retries = options.retries ?? 0;
  const line = `${options.command}${options.newline ?? "\n"}`;
  const logger = options.logger ?? noopLogger;
  const prompt = options.prompt;

  const finishedBy = (transcript: CommandTranscript): boolean => {
    if (prompt === undefined) return true;
    const text = stripAnsi(transcript.chunks.join(""));
    if (typeof prompt === "string") return text.includes(prompt);
    prompt.lastIndex = 0;
    return prompt.test(text);
  };

  return new Interaction<CommandTranscript>({
    label: options.command,
    context: createTranscript(options.command),
    callback: (value, scope) => {
      const transcript = scope.context;

      if (value === undefined || value === SENT) {
        if (transcript.attempts > 0) return keepWaiting();
        transcript.attempts = 1;
        return line;
      }

      if (value === TIMEOUT) {
        if (transcript.attempts <= retries) {
          transcript.attempts++;
          logger.warn("Command timed out; sending it again", {
            command: options.command,
            attempt: transcript.attempts,
          });
          return line;
        }
        transcript.timedOut = true;
        return INTERACTION_DONE;
      }

      transcript.chunks.push(value);
      if (!finishedBy(transcript)) return keepWaiting();
      transcript.finished = true;
      return INTERACTION_DONE;
    },
    cleanup: (transcript) => {
      options.onComplete?.({
        command: transcript.command,
        output: transcript.chunks.join(""),
        attempts: transcript.attempts,
        timedOut: transcript.timedOut,
        cancelled: !transcript.finished && !transcript.timedOut,
      });
    },
  });
}

/**
 * Send `text` and wait until the output matches `pattern`. `onResult` receives
 * the matching output, or null when the wait timed out or was cancelled after
 * the text went out.
 */
export function* expectReply(
  text: string,
  pattern: string | RegExp,
  onResult: (output: string | null) => void,
): Generator<Yielded, void, ResumeValue> {
  let settled = false;
  try {
    const reply = yield sendUntil(text, outputMatches(pattern));
    settled = true;
    onResult(typeof reply === "string" ? reply : null);
  } finally {
    if (!settled) onResult(null);
  }
}
