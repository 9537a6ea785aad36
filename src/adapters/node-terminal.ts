import { type ChildProcess, spawn as nodeSpawn } from "node:child_process";
import { TypedEventEmitter } from "../core/typed-emitter.js";
import { ProcessError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { OutputSource, ProcessSink } from "../interfaces/process-sink.js";
import { noopLogger } from "../utils/noop-logger.js";

export interface NodeTerminalOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

export interface NodeTerminalEvents {
  data: { chunk: string };
  exit: { code: number | null };
}

type KillSignal = "SIGTERM" | "SIGKILL" | "SIGINT" | "SIGHUP";

/**
 * A subprocess spawned with node:child_process, exposed as the sink and output
 * source of a TerminalConnection. stdout and stderr are merged into one stream
 * of text the way a terminal shows them.
 */
export class NodeTerminal
  extends TypedEventEmitter<NodeTerminalEvents>
  implements ProcessSink, OutputSource
{
  readonly pid: number;
  /** Resolves when the process exits. Null exit code means killed by signal. */
  readonly exited: Promise<number | null>;
  private alive = true;

  private constructor(
    private readonly child: ChildProcess,
    pid: number,
    private readonly logger: Logger,
  ) {
    super();
    this.pid = pid;

    this.exited = new Promise<number | null>((resolve) => {
      // "close" rather than "exit": stdout and stderr are drained by then.
      child.on("close", (code, signal) => {
        this.markExited(signal ? null : code);
        resolve(signal ? null : code);
      });
      child.on("error", (error) => {
        this.logger.warn("Subprocess error", { error, pid });
        this.markExited(null);
        resolve(null);
      });
    });

    for (const stream of [child.stdout, child.stderr]) {
      if (!stream) continue;
      stream.setEncoding("utf8");
      stream.on("data", (chunk: string) => {
        this.emit("data", { chunk });
      });
    }

    // EPIPE after the process has gone away; send() already treats it as dead.
    child.stdin?.on("error", (error) => {
      this.logger.debug?.("Subprocess stdin closed", { error, pid });
    });
  }

  static spawn(options: NodeTerminalOptions): NodeTerminal {
    const child = nodeSpawn(options.command, options.args ?? [], {
      cwd: options.cwd,
      env: options.env ? definedEnv(options.env) : undefined,
      stdio: ["pipe", "pipe", "pipe"],
    });

    // Attach an early error listener immediately after spawn() so ENOENT-style
    // failures cannot surface as unhandled exceptions before we build the terminal.
    const earlyErrorListener = () => {};
    child.on("error", earlyErrorListener);

    if (typeof child.pid !== "number") {
      throw new ProcessError(`Failed to spawn process: ${options.command}`);
    }

    const terminal = new NodeTerminal(child, child.pid, options.logger ?? noopLogger);
    child.off("error", earlyErrorListener);
    return terminal;
  }

  send(data: string): void {
    const stdin = this.child.stdin;
    if (!this.alive || !stdin || stdin.destroyed) {
      this.logger.debug?.("Dropping send to exited subprocess", { pid: this.pid });
      return;
    }
    stdin.write(data);
  }

  isAlive(): boolean {
    return this.alive;
  }

  kill(signal: KillSignal = "SIGTERM"): void {
    try {
      this.child.kill(signal);
    } catch {
      // Process may already be dead
    }
  }

  onData(listener: (chunk: string) => void): () => void {
    const handler = ({ chunk }: NodeTerminalEvents["data"]) => listener(chunk);
    this.on("data", handler);
    return () => {
      this.off("data", handler);
    };
  }

  onExit(listener: (code: number | null) => void): () => void {
    const handler = ({ code }: NodeTerminalEvents["exit"]) => listener(code);
    this.on("exit", handler);
    return () => {
      this.off("exit", handler);
    };
  }

  private markExited(code: number | null): void {
    if (!this.alive) return;
    this.alive = false;
    this.emit("exit", { code });
  }
}

function definedEnv(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}
