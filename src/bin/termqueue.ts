#!/usr/bin/env node
import { createInterface } from "node:readline";
import { NodeTerminal } from "../adapters/node-terminal.js";
import { LogLevel, parseLogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { type CliConfig, formatResult, HELP, parseArgs, UsageError } from "../cli/args.js";
import { commandInteraction } from "../core/command-interaction.js";
import { TerminalConnection } from "../core/terminal-connection.js";
import { resolveConfig } from "../types/config.js";

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
  let config: CliConfig | null;
  try {
    config = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`Error: ${err.message}\nRun with --help for usage.`);
    return 1;
  }
  if (!config) {
    console.log(HELP);
    return 0;
  }

  const logger = new StructuredLogger({
    component: "termqueue",
    level:
      parseLogLevel(process.env.TERMQUEUE_LOG_LEVEL) ??
      (config.verbose ? LogLevel.DEBUG : LogLevel.WARN),
  });

  // Validated before the child is spawned.
  const queueConfig = resolveConfig({
    timeoutMs: config.timeoutMs,
    stableDelayMs: config.stableDelayMs,
  });

  const terminal = NodeTerminal.spawn({
    command: config.command,
    args: config.args,
    cwd: process.cwd(),
    logger: logger.child("terminal"),
  });
  const connection = new TerminalConnection({
    terminal,
    logger,
    config: queueConfig,
  });

  let failures = 0;
  const lines = createInterface({ input: process.stdin, terminal: false });
  for await (const line of lines) {
    if (line.trim() === "") continue;
    connection.enqueue(
      commandInteraction({
        command: line,
        prompt: config.prompt,
        retries: config.retries,
        logger,
        onComplete: (result) => {
          if (result.timedOut || result.cancelled) failures++;
          process.stdout.write(formatResult(result));
        },
      }),
    );
  }

  if (!connection.queue.isIdle) {
    await Promise.race([
      new Promise<void>((resolve) => connection.queue.once("idle", () => resolve())),
      terminal.exited,
    ]);
  }

  connection.close();
  terminal.kill();
  return failures > 0 ? 2 : 0;
}

main().then(
  (code) => {
    process.exit(code);
  },
  (err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  },
);
