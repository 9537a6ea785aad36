import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { beforeEach, describe, expect, it, vi } from "vitest";

const { mockSpawn } = vi.hoisted(() => ({ mockSpawn: vi.fn() }));

vi.mock("node:child_process", () => ({ spawn: mockSpawn }));

import { ProcessError } from "../errors.js";
import { NodeTerminal } from "./node-terminal.js";

class FakeChild extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly kill = vi.fn();
  readonly written: string[] = [];
  readonly pid: number | undefined;

  constructor(pid: number | null) {
    super();
    this.pid = pid ?? undefined;
    this.stdin.setEncoding("utf8");
    this.stdin.on("data", (chunk: string) => this.written.push(chunk));
  }
}

function spawnFake(pid: number | null = 4242) {
  const child = new FakeChild(pid);
  mockSpawn.mockReturnValueOnce(child);
  return child;
}

/** Let stream events scheduled with process.nextTick run. */
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("NodeTerminal", () => {
  beforeEach(() => {
    mockSpawn.mockReset();
  });

  it("spawns the command with piped stdio and a filtered env", () => {
    spawnFake();

    const terminal = NodeTerminal.spawn({
      command: "bash",
      args: ["--norc"],
      cwd: "/tmp",
      env: { TERM: "dumb", UNSET: undefined },
    });

    expect(terminal.pid).toBe(4242);
    expect(mockSpawn).toHaveBeenCalledWith("bash", ["--norc"], {
      cwd: "/tmp",
      env: { TERM: "dumb" },
      stdio: ["pipe", "pipe", "pipe"],
    });
  });

  it("throws ProcessError when the process has no pid", () => {
    spawnFake(null);

    expect(() => NodeTerminal.spawn({ command: "missing-binary" })).toThrow(ProcessError);
  });

  it("writes sends to stdin while alive", async () => {
    const child = spawnFake();
    const terminal = NodeTerminal.spawn({ command: "sh" });

    terminal.send("echo hi\n");
    await flush();

    expect(child.written).toEqual(["echo hi\n"]);
    expect(terminal.isAlive()).toBe(true);
  });

  it("merges stdout and stderr into data events", async () => {
    const child = spawnFake();
    const terminal = NodeTerminal.spawn({ command: "sh" });
    const chunks: string[] = [];
    terminal.onData((chunk) => chunks.push(chunk));

    child.stdout.write("out\n");
    await flush();
    child.stderr.write("err\n");
    await flush();

    expect(chunks).toEqual(["out\n", "err\n"]);
  });

  it("reports exit once, resolves exited and drops later sends", async () => {
    const child = spawnFake();
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const terminal = NodeTerminal.spawn({ command: "sh", logger });
    const exits: Array<number | null> = [];
    terminal.onExit((code) => exits.push(code));

    child.emit("close", 3, null);
    child.emit("close", 3, null);

    await expect(terminal.exited).resolves.toBe(3);
    expect(exits).toEqual([3]);
    expect(terminal.isAlive()).toBe(false);

    terminal.send("ignored\n");
    await flush();
    expect(child.written).toEqual([]);
    expect(logger.debug).toHaveBeenCalledWith("Dropping send to exited subprocess", { pid: 4242 });
  });

  it("resolves exited with null when killed by a signal", async () => {
    const child = spawnFake();
    const terminal = NodeTerminal.spawn({ command: "sh" });

    terminal.kill("SIGKILL");
    child.emit("close", null, "SIGKILL");

    expect(child.kill).toHaveBeenCalledWith("SIGKILL");
    await expect(terminal.exited).resolves.toBeNull();
  });

  it("treats a spawn error as exit", async () => {
    const child = spawnFake();
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const terminal = NodeTerminal.spawn({ command: "sh", logger });

    child.emit("error", new Error("EACCES"));

    await expect(terminal.exited).resolves.toBeNull();
    expect(terminal.isAlive()).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith("Subprocess error", {
      error: expect.any(Error),
      pid: 4242,
    });
  });

  it("unsubscribes listeners through the returned disposer", async () => {
    const child = spawnFake();
    const terminal = NodeTerminal.spawn({ command: "sh" });
    const chunks: string[] = [];
    const dispose = terminal.onData((chunk) => chunks.push(chunk));

    dispose();
    child.stdout.write("unseen\n");
    await flush();

    expect(chunks).toEqual([]);
  });
});
