/**
 * termqueue public API barrel.
 *
 * Re-exports the interaction queue, the generator protocol, the Node adapters
 * and the utilities that make up the public surface of the `termqueue` package.
 * @module
 */

// Adapters
export type { NodeTerminalEvents, NodeTerminalOptions } from "./adapters/node-terminal.js";
export { NodeTerminal } from "./adapters/node-terminal.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export { queueConfigSchema } from "./config/config-schema.js";
// Core
export type {
  CommandInteractionOptions,
  CommandResult,
  CommandTranscript,
} from "./core/command-interaction.js";
export { commandInteraction, createTranscript, expectReply } from "./core/command-interaction.js";
export type {
  InteractionCallback,
  InteractionOptions,
  InteractionScope,
} from "./core/interaction.js";
export { INTERACTION_DONE, Interaction } from "./core/interaction.js";
export type {
  InteractionQueueEvents,
  InteractionQueueOptions,
} from "./core/interaction-queue.js";
export { InteractionQueue } from "./core/interaction-queue.js";
export type { OneShotOptions } from "./core/one-shot.js";
export { oneShot } from "./core/one-shot.js";
export type { OutputMatchOptions } from "./core/predicates.js";
export { outputMatches } from "./core/predicates.js";
export type { TerminalConnectionOptions } from "./core/terminal-connection.js";
export { TerminalConnection } from "./core/terminal-connection.js";
export { Debouncer, OneShotTimer } from "./core/timers.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
export type {
  AcceptPredicate,
  ClassifiedYield,
  FireAndForget,
  KeepWaiting,
  PlainSend,
  Resumable,
  ResumeValue,
  WaitUntil,
  Yielded,
} from "./core/yields.js";
export {
  classifyYield,
  describeResumeValue,
  fireAndForget,
  keepWaiting,
  SENT,
  sendUntil,
  TIMEOUT,
} from "./core/yields.js";
// Errors
export {
  errorMessage,
  InteractionClosedError,
  InvalidYieldError,
  ProcessError,
  TermQueueError,
  toTermQueueError,
} from "./errors.js";
// Interfaces
export type { Logger } from "./interfaces/logger.js";
export type { OutputSource, ProcessSink } from "./interfaces/process-sink.js";
// Types
export type { QueueConfig, ResolvedConfig } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";
// Utilities
export { stripAnsi } from "./utils/ansi-strip.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
