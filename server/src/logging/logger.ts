import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class Logger {
  private static threshold: LogLevel = "info";
  private static enabled = true;
  private static sink: fs.WriteStream | null = null;

  private readonly category: string;

  constructor(category: string) {
    this.category = category;
  }

  static configure(opts: { level?: LogLevel; file?: string; enabled?: boolean }) {
    if (opts.level) Logger.threshold = opts.level;
    if (opts.enabled !== undefined) Logger.enabled = opts.enabled;

    if (opts.file) {
      const dir = path.dirname(opts.file);
      if (dir) fs.mkdirSync(dir, { recursive: true });
      Logger.closeSink();
      Logger.sink = fs.createWriteStream(opts.file, { flags: "a", encoding: "utf-8" });
    }
  }

  static closeSink(done?: () => void) {
    if (!Logger.sink) {
      done?.();
      return;
    }
    Logger.sink.end(done);
    Logger.sink = null;
  }

  debug(message: string) {
    this.write("debug", message);
  }

  info(message: string) {
    this.write("info", message);
  }

  warn(message: string) {
    this.write("warn", message);
  }

  error(message: string, err?: unknown) {
    const detail = err instanceof Error && err.stack ? `\n${err.stack}` : "";
    this.write("error", `${message}${detail}`);
  }

  private write(level: LogLevel, message: string) {
    if (!Logger.enabled || LEVEL_ORDER[level] < LEVEL_ORDER[Logger.threshold]) return;

    const line = `${new Date().toISOString()} - ${this.category} - ${level.toUpperCase()} - ${message}`;

    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }

    Logger.sink?.write(`${line}\n`);
  }
}
