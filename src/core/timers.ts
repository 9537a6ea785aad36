/**
 * Timer primitives for the queue: a one-shot timer that holds at most one armed
 * instance, and a debouncer that coalesces bursts into one delivery.
 * @module
 */

export class OneShotTimer {
  private handle: ReturnType<typeof setTimeout> | null = null;

  /** Arm the timer, replacing any instance that is still pending. */
  arm(delayMs: number, fire: () => void): void {
    this.cancel();
    this.handle = setTimeout(() => {
      this.handle = null;
      fire();
    }, delayMs);
  }

  cancel(): void {
    if (!this.handle) return;
    clearTimeout(this.handle);
    this.handle = null;
  }

  get armed(): boolean {
    return this.handle !== null;
  }
}

/**
 * Delivers the last scheduled value once no new value has arrived for `delayMs`.
 */
export class Debouncer<T> {
  private readonly timer = new OneShotTimer();
  private pending: { value: T } | null = null;

  constructor(
    private readonly delayMs: number,
    private readonly deliver: (value: T) => void,
  ) {}

  /**
   * Re-arm the quiet period. With `merge`, a value still pending is combined
   * with the new one instead of being replaced.
   */
  schedule(value: T, merge?: (pending: T, next: T) => T): void {
    const pending = this.pending;
    this.pending = { value: pending && merge ? merge(pending.value, value) : value };
    this.timer.arm(this.delayMs, () => {
      this.flush();
    });
  }

  /** Deliver a pending value now. Returns false when nothing was pending. */
  flush(): boolean {
    const pending = this.pending;
    if (!pending) return false;
    this.pending = null;
    this.timer.cancel();
    this.deliver(pending.value);
    return true;
  }

  cancel(): void {
    this.pending = null;
    this.timer.cancel();
  }

  get hasPending(): boolean {
    return this.pending !== null;
  }
}
