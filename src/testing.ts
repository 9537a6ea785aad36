/**
 * Public test utilities: exported from the `"termqueue/testing"` entry point.
 */
export { MockTerminal } from "./testing/mock-terminal.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
