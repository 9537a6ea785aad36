/**
 * Interaction: a resumable unit of work built from a stateful callback,
 * adapted to the same `next`/`return` protocol as a native generator so the
 * queue can drive both without telling them apart.
 *
 * The ambient context (typically the buffer the exchange belongs to) is an
 * explicit value: the callback receives it through a scope object and may
 * rebind it; the adapter stores whatever the callback left behind and hands it
 * back on the next resume.
 * @module
 */

import { errorMessage, InteractionClosedError } from "../errors.js";
import type { Resumable, ResumeValue, Yielded } from "./yields.js";

/** Returned by a callback to signal the interaction is finished. */
export const INTERACTION_DONE: unique symbol = Symbol("termqueue.interaction-done");

export interface InteractionScope<C> {
  context: C;
}

export type InteractionCallback<C> = (
  value: ResumeValue,
  scope: InteractionScope<C>,
) => Yielded | typeof INTERACTION_DONE;

export interface InteractionOptions<C> {
  callback: InteractionCallback<C>;
  context: C;
  /** Runs exactly once, inside the initial context, however the interaction ends. */
  cleanup?: (context: C) => void;
  /** Used in error messages and logs. */
  label?: string;
}

const EXHAUSTED: IteratorReturnResult<undefined> = Object.freeze({ value: undefined, done: true });

export class Interaction<C> implements Resumable {
  readonly label: string;
  readonly initialContext: C;
  private savedContext: C;
  private callback: InteractionCallback<C>;
  private cleanup: ((context: C) => void) | undefined;
  private closed = false;

  constructor(options: InteractionOptions<C>) {
    this.callback = options.callback;
    this.cleanup = options.cleanup;
    this.initialContext = options.context;
    this.savedContext = options.context;
    this.label = options.label ?? "interaction";
  }

  /** The context the callback last established. */
  get context(): C {
    return this.savedContext;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  next(value: ResumeValue): IteratorResult<Yielded, undefined> {
    const scope: InteractionScope<C> = { context: this.savedContext };
    let result: Yielded | typeof INTERACTION_DONE;
    try {
      result = this.callback(value, scope);
    } catch (err) {
      // A failed callback ends the interaction the way a throwing generator does.
      if (!(err instanceof InteractionClosedError)) {
        try {
          this.return();
        } catch (cleanupError) {
          throw new AggregateError([err, cleanupError], errorMessage(err), { cause: err });
        }
      }
      throw err;
    }
    this.savedContext = scope.context;

    if (result === INTERACTION_DONE) {
      this.return();
      return EXHAUSTED;
    }
    return { value: result, done: false };
  }

  /** Close the interaction. Idempotent; safe before the first resume. */
  return(): IteratorReturnResult<undefined> {
    if (this.closed) return EXHAUSTED;
    this.closed = true;

    const label = this.label;
    this.callback = () => {
      throw new InteractionClosedError(label);
    };

    const cleanup = this.cleanup;
    this.cleanup = undefined;
    cleanup?.(this.initialContext);
    return EXHAUSTED;
  }
}
