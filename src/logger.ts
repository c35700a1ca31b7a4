import { createWriteStream, type WriteStream } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  ts: number;
  level: LogLevel;
  msg: string;
  component: string;
  error?: { name: string; message: string };
  [key: string]: unknown;
}

/** Receives one formatted line per entry. */
export type LogSink = (line: string) => void;

export interface Logger {
  debug(msg: string, meta?: object): void;
  info(msg: string, meta?: object): void;
  warn(msg: string, meta?: object): void;
  error(msg: string, error?: unknown, meta?: object): void;
  child(component: string): Logger;
  isLevelEnabled(level: LogLevel): boolean;
}

export interface LoggerOptions {
  level?: LogLevel;
  component?: string;
  sink?: LogSink;
}

// The terminal is owned by the renderer, so nothing here writes to stdout.
export class AppLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly component: string;
  private readonly sink: LogSink | undefined;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.level ?? "info";
    this.component = options.component ?? "app";
    this.sink = options.sink;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.sink !== undefined && LEVEL_VALUES[level] >= LEVEL_VALUES[this.minLevel];
  }

  private output(level: LogLevel, msg: string, meta: object = {}, error?: unknown): void {
    if (!this.sink || !this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      ts: Date.now(),
      level,
      msg,
      component: this.component,
      ...meta,
    };
    if (error !== undefined) {
      entry.error =
        error instanceof Error
          ? { name: error.name, message: error.message }
          : { name: "Error", message: String(error) };
    }

    this.sink(formatEntry(entry));
  }

  debug(msg: string, meta?: object): void {
    this.output("debug", msg, meta);
  }

  info(msg: string, meta?: object): void {
    this.output("info", msg, meta);
  }

  warn(msg: string, meta?: object): void {
    this.output("warn", msg, meta);
  }

  error(msg: string, error?: unknown, meta?: object): void {
    this.output("error", msg, meta, error);
  }

  child(component: string): Logger {
    return new AppLogger({ level: this.minLevel, component, sink: this.sink });
  }
}

export function formatEntry(entry: LogEntry): string {
  const { ts, level, msg, component, error, ...rest } = entry;
  let line = `${new Date(ts).toISOString()} ${level.toUpperCase().padEnd(5)} [${component}] ${msg}`;
  if (Object.keys(rest).length > 0) {
    line += ` ${JSON.stringify(rest)}`;
  }
  if (error) {
    line += ` (${error.name}: ${error.message})`;
  }
  return line;
}

export interface FileLogger {
  logger: Logger;
  close(): Promise<void>;
}

export function createFileLogger(path: string, level: LogLevel): FileLogger {
  const stream: WriteStream = createWriteStream(path, { flags: "a" });
  // Write failures disable the sink.
  stream.on("error", () => stream.destroy());

  const logger = new AppLogger({
    level,
    component: "app",
    sink: (line) => {
      if (!stream.destroyed) stream.write(line + "\n");
    },
  });

  return {
    logger,
    close: () =>
      new Promise<void>((resolve) => {
        if (stream.destroyed) {
          resolve();
          return;
        }
        stream.end(() => resolve());
      }),
  };
}

export const silentLogger: Logger = new AppLogger();
