import { describe, expect, it } from "vitest";
import { TIMEOUT } from "../core/yields.js";
import { LogLevel, parseLogLevel, StructuredLogger } from "./structured-logger.js";

function capture(options: { level?: LogLevel; component?: string } = {}) {
  const lines: string[] = [];
  const logger = new StructuredLogger({ writer: (line) => lines.push(line), ...options });
  return { lines, logger };
}

describe("StructuredLogger", () => {
  it("outputs JSON lines to the writer", () => {
    const { lines, logger } = capture();

    logger.info("queue drained", { completed: 3 });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe("info");
    expect(parsed.msg).toBe("queue drained");
    expect(parsed.completed).toBe(3);
    expect(parsed.time).toBeTypeOf("string"); // ISO 8601
  });

  it("respects log level filtering", () => {
    const { lines, logger } = capture({ level: LogLevel.WARN });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("visible");
    logger.error("visible");

    expect(lines).toHaveLength(2);
  });

  it("includes component name when set", () => {
    const { lines, logger } = capture({ component: "termqueue" });

    logger.info("test");

    expect(JSON.parse(lines[0]).component).toBe("termqueue");
  });

  it("child loggers nest the component and share the writer", () => {
    const { lines, logger } = capture({ component: "termqueue", level: LogLevel.INFO });

    const child = logger.child("queue");
    child.debug("hidden");
    child.info("visible");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).component).toBe("termqueue/queue");
  });

  it("serializes error objects with stack", () => {
    const { lines, logger } = capture();

    logger.error("failed", { error: new Error("boom") });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.error).toBe("boom");
    expect(parsed.errorStack).toContain("Error: boom");
  });

  it("renders symbols by their description", () => {
    const { lines, logger } = capture();

    logger.debug("resumed", { value: TIMEOUT });

    expect(JSON.parse(lines[0]).value).toBe("termqueue.timeout");
  });

  it("does not allow ctx to overwrite reserved fields", () => {
    const { lines, logger } = capture({ component: "test" });

    logger.info("spoofed", { level: "debug", time: "fake", msg: "injected", component: "evil" });

    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe("info");
    expect(parsed.msg).toBe("spoofed");
    expect(parsed.component).toBe("test");
    expect(parsed.time).not.toBe("fake");
  });

  it("survives circular references in ctx", () => {
    const { lines, logger } = capture();

    const circular: Record<string, unknown> = { key: "value" };
    circular.self = circular;

    logger.error("circular data", circular);

    expect(lines).toHaveLength(1);
    const parsed = JSON.parse(lines[0]);
    expect(parsed.msg).toBe("circular data");
    expect(parsed.serializationError).toBe(true);
  });
});

describe("parseLogLevel", () => {
  it("accepts level names case-insensitively", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(" WARN ")).toBe(LogLevel.WARN);
  });

  it("returns undefined for unknown or missing names", () => {
    expect(parseLogLevel("verbose")).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
