/**
 * InteractionQueue: serializes interactions onto one subprocess connection.
 *
 * Owns the current generator, a FIFO of pending generators, the armed accept
 * predicate, and two timers: a hard timeout that delivers TIMEOUT when the
 * subprocess stops answering, and a stable-delay debouncer that coalesces
 * bursts of output into a single resume.
 *
 * Drive cycle (`resume`):
 *   1. cancel the timeout
 *   2. while a generator is current: check the accept predicate, then resume the
 *      generator until it yields something to wait on or is exhausted (in which
 *      case the next pending generator takes over)
 *   3. arm the timeout if a generator is still current
 *
 * Everything runs on the event loop thread. `resume` and `cancel` must not be
 * called from inside a generator or a `send` listener; both throw if they are.
 *
 * @module
 */

import { TermQueueError, toTermQueueError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ProcessSink } from "../interfaces/process-sink.js";
import { type QueueConfig, type ResolvedConfig, resolveConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { oneShot } from "./one-shot.js";
import { Debouncer, OneShotTimer } from "./timers.js";
import { TypedEventEmitter } from "./typed-emitter.js";
import {
  type AcceptPredicate,
  type ClassifiedYield,
  classifyYield,
  describeResumeValue,
  type Resumable,
  type ResumeValue,
  SENT,
  TIMEOUT,
} from "./yields.js";

export interface InteractionQueueEvents {
  /** Text was handed to the subprocess sink. */
  send: { text: string; fireAndForget: boolean };
  /** The timeout fired and TIMEOUT is about to be delivered. */
  timeout: { pending: number };
  /** The last generator finished and nothing is pending. */
  idle: { completed: number };
  /** A timer-driven resume raised; the error was logged instead of thrown. */
  failure: { error: TermQueueError; source: "timeout" | "stable-delay" };
}

export interface InteractionQueueOptions {
  sink: ProcessSink;
  config?: QueueConfig;
  logger?: Logger;
}

export class InteractionQueue extends TypedEventEmitter<InteractionQueueEvents> {
  readonly config: ResolvedConfig;
  private readonly sink: ProcessSink;
  private readonly logger: Logger;

  private current: Resumable | null = null;
  private readonly pending: Resumable[] = [];
  private accept: AcceptPredicate | null = null;

  private readonly timeoutTimer = new OneShotTimer();
  private readonly stableDelay: Debouncer<ResumeValue>;

  private driving = false;
  private cancelling = false;
  private resumeCount = 0;
  private completed = 0;

  constructor(options: InteractionQueueOptions) {
    super();
    this.sink = options.sink;
    this.logger = options.logger ?? noopLogger;
    this.config = resolveConfig(options.config);
    this.stableDelay = new Debouncer(this.config.stableDelayMs, (value) => {
      this.resumeFromTimer(value, "stable-delay");
    });
  }

  // ── Enqueue ────────────────────────────────────────────────────────────

  /**
   * Add a generator. An idle queue starts driving it immediately; otherwise it
   * runs after everything already queued.
   */
  enqueue(generator: Resumable | null | undefined): void {
    if (!generator) return;
    if (this.cancelling) {
      this.logger.warn("Dropping generator enqueued during cancel");
      generator.return();
      return;
    }
    if (this.current) {
      this.pending.push(generator);
      return;
    }
    this.current = generator;
    this.resume();
  }

  /** Enqueue a single send. A fire-and-forget send does not wait for a response. */
  enqueueString(text: string, options: { fireAndForget?: boolean } = {}): void {
    this.enqueue(oneShot(text, options));
  }

  // ── Drive ──────────────────────────────────────────────────────────────

  /** Resume the current generator with what happened since it suspended. */
  resume(value: ResumeValue = undefined): void {
    if (this.driving) {
      throw new TermQueueError("resume() called while a generator is running", "REENTRANT_RESUME");
    }

    this.timeoutTimer.cancel();
    this.resumeCount++;
    this.driving = true;
    const completedBefore = this.completed;
    let failure: { error: unknown } | null = null;
    try {
      this.drive(value);
    } catch (error) {
      failure = { error };
    }
    this.driving = false;
    if (this.current) this.armTimeout();

    if (!this.current && this.completed !== completedBefore && this.pending.length === 0) {
      this.emit("idle", { completed: this.completed });
    }
    if (failure) throw failure.error;
  }

  /** Schedule a resume after the stable delay. Re-scheduling keeps only the latest value. */
  resumeAfterStableDelay(value: ResumeValue): void {
    this.stableDelay.schedule(value);
  }

  /**
   * Like resumeAfterStableDelay, but output chunks arriving within one quiet
   * period are concatenated so the generator sees the whole burst.
   */
  bufferOutput(chunk: string): void {
    this.stableDelay.schedule(chunk, appendOutput);
  }

  private drive(initial: ResumeValue): void {
    let value = initial;
    let failure: { error: unknown } | null = null;

    cycle: while (this.current) {
      if (this.accept && !this.checkAccept(this.accept, value)) break;

      const generator = this.current;
      for (;;) {
        let step: ClassifiedYield | null;
        try {
          const result = generator.next(value);
          step = result.done ? null : classifyYield(result.value);
        } catch (error) {
          failure ??= { error };
          this.logger.error("Interaction failed; moving to the next one", { error });
          this.closeQuietly(generator);
          step = null;
        }

        if (step === null) {
          this.completed++;
          this.current = this.pending.shift() ?? null;
          value = undefined;
          continue cycle;
        }

        switch (step.kind) {
          case "keep-waiting":
            break cycle;
          case "fire-and-forget":
            this.send(step.text, true);
            value = SENT;
            continue;
          case "until":
            this.accept = step.accept;
            this.send(step.text, false);
            break cycle;
          case "send":
            this.send(step.text, false);
            break cycle;
        }
      }
    }

    if (failure) throw failure.error;
  }

  /** Returns true when the generator may be resumed with `value`. */
  private checkAccept(accept: AcceptPredicate, value: ResumeValue): boolean {
    let accepted: boolean;
    try {
      accepted = accept(value);
    } catch (error) {
      this.accept = null;
      this.logger.warn("Accept predicate threw; waiting for the next resume", {
        error,
        value: describeResumeValue(value),
      });
      return false;
    }
    if (accepted) this.accept = null;
    return accepted;
  }

  private send(text: string, fireAndForget: boolean): void {
    this.logger.debug?.("Sending to subprocess", { length: text.length, fireAndForget });
    try {
      this.sink.send(text);
    } catch (error) {
      this.logger.warn("Send to subprocess failed", { error });
    }
    this.emit("send", { text, fireAndForget });
  }

  // ── Timers ─────────────────────────────────────────────────────────────

  private armTimeout(): void {
    this.timeoutTimer.arm(this.config.timeoutMs, () => {
      this.onTimeout();
    });
  }

  private onTimeout(): void {
    if (!this.current) return;

    // Output may have arrived just as the timer fired; deliver it instead.
    const resumesBefore = this.resumeCount;
    let alive = false;
    try {
      alive = this.sink.isAlive();
      if (alive) this.sink.pollOutput?.();
    } catch (error) {
      this.logger.warn("Polling subprocess output failed", { error });
    }
    if (alive) this.stableDelay.flush();
    if (this.resumeCount !== resumesBefore || !this.current) return;

    this.logger.debug?.("Timed out waiting for subprocess output", {
      timeoutMs: this.config.timeoutMs,
    });
    this.emit("timeout", { pending: this.pending.length });
    this.resumeFromTimer(TIMEOUT, "timeout");
  }

  private resumeFromTimer(value: ResumeValue, source: "timeout" | "stable-delay"): void {
    try {
      this.resume(value);
    } catch (err) {
      const error = toTermQueueError(err);
      this.logger.error("Timer-driven resume failed", { error, source });
      this.emit("failure", { error, source });
    }
  }

  // ── Cancellation ───────────────────────────────────────────────────────

  /**
   * Close the current and every pending generator (running their cleanups)
   * and cancel both timers. The queue stays usable afterwards.
   */
  cancel(): void {
    if (this.driving) {
      throw new TermQueueError("cancel() called while a generator is running", "REENTRANT_CANCEL");
    }

    this.accept = null;
    this.timeoutTimer.cancel();
    this.stableDelay.cancel();

    const generators = this.current ? [this.current, ...this.pending] : [...this.pending];
    this.current = null;
    this.pending.length = 0;

    this.cancelling = true;
    try {
      for (const generator of generators) this.closeQuietly(generator);
    } finally {
      this.cancelling = false;
    }
  }

  private closeQuietly(generator: Resumable): void {
    try {
      generator.return();
    } catch (error) {
      this.logger.error("Interaction cleanup failed", { error });
    }
  }

  // ── Observers ──────────────────────────────────────────────────────────

  get isIdle(): boolean {
    return this.current === null;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /** True while an accept predicate gates the current generator. */
  get isGated(): boolean {
    return this.accept !== null;
  }

  get hasArmedTimers(): boolean {
    return this.timeoutTimer.armed || this.stableDelay.hasPending;
  }
}

function appendOutput(pending: ResumeValue, next: ResumeValue): ResumeValue {
  return typeof pending === "string" && typeof next === "string" ? pending + next : next;
}
