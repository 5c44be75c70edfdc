import { getConfig, type LogLevel } from "@/src/main/config";

export type LogMeta = Record<string, unknown>;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

/**
 * Scoped console logger. Every line is prefixed with `[scope]`, e.g.
 * `[Library.Scanner] scan done { added: 1 }`.
 */
export class Logger {
  private constructor(
    private readonly scope: string,
    private readonly minLevel: () => LogLevel
  ) {}

  static create(scope: string, level?: LogLevel): Logger {
    return new Logger(scope, () => level ?? getConfig().logLevel);
  }

  debug(message: string, meta?: LogMeta): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write("error", message, meta);
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, meta?: LogMeta) {
    if (RANK[level] < RANK[this.minLevel()]) return;
    const line = `[${this.scope}] ${message}`;
    const args: unknown[] = meta && Object.keys(meta).length > 0 ? [line, meta] : [line];
    switch (level) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.log(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  }
}
