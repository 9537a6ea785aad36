import type { Logger } from "../interfaces/logger.js";
import type { OutputSource, ProcessSink } from "../interfaces/process-sink.js";
import type { QueueConfig } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import { InteractionQueue } from "./interaction-queue.js";
import type { Resumable } from "./yields.js";

export interface TerminalConnectionOptions {
  terminal: ProcessSink & OutputSource;
  config?: QueueConfig;
  logger?: Logger;
  /**
   * Route output through the stable delay (default). When false every chunk
   * resumes the queue as soon as it arrives.
   */
  debounce?: boolean;
}

/**
 * Binds one InteractionQueue to one subprocess: output chunks resume the
 * queue, and the queue is cancelled when the subprocess exits.
 */
export class TerminalConnection {
  readonly queue: InteractionQueue;
  private readonly logger: Logger;
  private readonly debounce: boolean;
  private readonly disposers: Array<() => void>;
  private closed = false;

  constructor(options: TerminalConnectionOptions) {
    this.logger = options.logger ?? noopLogger;
    this.debounce = options.debounce ?? true;
    this.queue = new InteractionQueue({
      sink: options.terminal,
      config: options.config,
      logger: this.logger,
    });
    this.disposers = [
      options.terminal.onData((chunk) => this.handleData(chunk)),
      options.terminal.onExit((code) => this.handleExit(code)),
    ];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  enqueue(generator: Resumable): void {
    if (this.closed) {
      this.logger.warn("Connection closed; closing generator without running it");
      generator.return();
      return;
    }
    this.queue.enqueue(generator);
  }

  /** Cancel outstanding interactions and stop listening. The subprocess is left alone. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const dispose of this.disposers) dispose();
    this.queue.cancel();
  }

  private handleData(chunk: string): void {
    if (this.closed) return;
    if (this.debounce) {
      this.queue.bufferOutput(chunk);
      return;
    }
    try {
      this.queue.resume(chunk);
    } catch (error) {
      this.logger.error("Resume on subprocess output failed", { error });
    }
  }

  private handleExit(code: number | null): void {
    if (this.closed) return;
    this.logger.info("Subprocess exited; cancelling pending interactions", {
      code,
      pending: this.queue.pendingCount,
    });
    this.close();
  }
}
