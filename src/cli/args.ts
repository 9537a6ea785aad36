import type { CommandResult } from "../core/command-interaction.js";
import { errorMessage } from "../errors.js";
import { stripAnsi } from "../utils/ansi-strip.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface CliConfig {
  command: string;
  args: string[];
  prompt?: RegExp;
  timeoutMs?: number;
  stableDelayMs?: number;
  retries: number;
  verbose: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// ── Arg parsing ────────────────────────────────────────────────────────────

export const HELP = `
  termqueue: run stdin lines as commands against one interactive subprocess

  Usage: termqueue [options] -- <command> [args...]

  Options:
    --prompt <regex>         Output that marks a command as finished
    --timeout-ms <n>         Wait this long for a response (default: 500)
    --stable-delay-ms <n>    Quiet period that coalesces output (default: 100)
    --retries <n>            Re-send a command this many times on timeout (default: 0)
    --verbose, -v            Verbose logging
    --help, -h               Show this help
`;

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined) throw new UsageError(`${flag} requires a value`);
  return value;
}

function requireInt(argv: string[], index: number, flag: string, min: number): number {
  const parsed = Number.parseInt(requireValue(argv, index, flag), 10);
  if (Number.isNaN(parsed)) throw new UsageError(`${flag} requires a number`);
  if (parsed < min) throw new UsageError(`${flag} must be at least ${min}`);
  return parsed;
}

/** Parse CLI arguments (without the node and script entries). Returns null for --help. */
export function parseArgs(argv: string[]): CliConfig | null {
  const config: Omit<CliConfig, "command" | "args"> = { retries: 0, verbose: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--prompt": {
        const source = requireValue(argv, ++i, arg);
        try {
          config.prompt = new RegExp(source);
        } catch (err) {
          throw new UsageError(`--prompt is not a valid regular expression: ${errorMessage(err)}`);
        }
        break;
      }
      case "--timeout-ms":
        config.timeoutMs = requireInt(argv, ++i, arg, 1);
        break;
      case "--stable-delay-ms":
        config.stableDelayMs = requireInt(argv, ++i, arg, 1);
        break;
      case "--retries":
        config.retries = requireInt(argv, ++i, arg, 0);
        break;
      case "--verbose":
      case "-v":
        config.verbose = true;
        break;
      case "--help":
      case "-h":
        return null;
      case "--": {
        const [command, ...args] = argv.slice(i + 1);
        if (command === undefined) throw new UsageError("Missing command after --");
        return { ...config, command, args };
      }
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  throw new UsageError("Missing command; pass it after --");
}

export function formatResult(result: CommandResult): string {
  const output = stripAnsi(result.output);
  if (result.timedOut) return `${output}[termqueue] "${result.command}" timed out\n`;
  if (result.cancelled) return `${output}[termqueue] "${result.command}" cancelled\n`;
  return output;
}
