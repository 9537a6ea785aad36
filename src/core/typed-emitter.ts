import { EventEmitter } from "node:events";

/**
 * node:events with the payload of each event checked against an event map,
 * e.g. `TypedEventEmitter<{ data: { chunk: string }; exit: { code: number | null } }>`.
 * Every event carries exactly one payload. Avoid an event named "error":
 * node:events throws when it has no listener.
 */
export class TypedEventEmitter<TEvents extends object> {
  private readonly events = new EventEmitter();

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.events.on(event, listener);
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.events.once(event, listener);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.events.off(event, listener);
    return this;
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.events.emit(event, payload);
  }
}
