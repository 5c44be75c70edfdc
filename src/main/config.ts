import os from "os";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type AppConfig = {
  /** Directory holding catalog.json and settings.json */
  dataDir: string;
  logLevel: LogLevel;
  /** Max metadata extractions in flight during a scan */
  scanConcurrency: number;
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value);
}

function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  const v = raw?.trim().toLowerCase();
  return v && isLogLevel(v) ? v : fallback;
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env.AUDIOSHELF_DATA_DIR?.trim() || path.join(os.homedir(), ".audioshelf");
  const defaultLevel: LogLevel = env.NODE_ENV === "test" ? "silent" : "info";
  return {
    dataDir: path.resolve(dataDir),
    logLevel: parseLogLevel(env.AUDIOSHELF_LOG_LEVEL, defaultLevel),
    scanConcurrency: parsePositiveInt(env.AUDIOSHELF_SCAN_CONCURRENCY, 4)
  };
}

let cached: AppConfig | null = null;

/** Process-wide configuration, resolved from the environment on first use. */
export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig();
  return cached;
}
