/**
 * The byte-stream boundary between an InteractionQueue and its subprocess.
 * The queue never creates or destroys the process behind a sink.
 * @module
 */

export interface ProcessSink {
  /** Transmit text to the subprocess. A no-op once the process has exited. */
  send(data: string): void;
  /** Whether the subprocess is still running. */
  isAlive(): boolean;
  /**
   * Deliver any output the I/O layer has already buffered but not yet reported.
   * Called by the queue just before it declares a timeout.
   */
  pollOutput?(): void;
}

/** Output side of a subprocess, as seen by a TerminalConnection. */
export interface OutputSource {
  onData(listener: (chunk: string) => void): () => void;
  onExit(listener: (code: number | null) => void): () => void;
}
