import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];
const RESERVED_FIELDS = new Set(["time", "level", "msg", "component"]);

/** Parse a level name ("debug", "WARN", ...). Unknown names yield undefined. */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  const wanted = name.trim().toLowerCase();
  return LEVELS.find((level) => LEVEL_NAMES[level] === wanted);
}

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
}

/** JSON-lines logger. One line per entry, written to stderr unless a writer is given. */
export class StructuredLogger implements Logger {
  private writer: (line: string) => void;
  private level: LogLevel;
  private component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.DEBUG;
    this.component = options.component;
  }

  /** A logger sharing writer and level, tagged `parent/component`. */
  child(component: string): StructuredLogger {
    return new StructuredLogger({
      writer: this.writer,
      level: this.level,
      component: this.component ? `${this.component}/${component}` : component,
    });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {
      time: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      msg,
    };

    if (this.component) entry.component = this.component;

    if (ctx) {
      for (const [key, value] of Object.entries(ctx)) {
        if (RESERVED_FIELDS.has(key)) continue;
        if (value instanceof Error) {
          entry[key] = value.message;
          entry[`${key}Stack`] = value.stack;
        } else if (typeof value === "symbol") {
          entry[key] = value.description ?? value.toString();
        } else {
          entry[key] = value;
        }
      }
    }

    try {
      this.writer(JSON.stringify(entry));
    } catch {
      // Circular reference or serialization failure: emit a safe fallback
      this.writer(
        JSON.stringify({ time: entry.time, level: entry.level, msg, serializationError: true }),
      );
    }
  }
}
