/** Diagnostics sink — console-backed by default, injectable for tests */

export type LogLevel = "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["info", "warn", "error", "silent"];

export interface Diagnostics {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function enabled(threshold: LogLevel, level: Exclude<LogLevel, "silent">): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export function createConsoleDiagnostics(
  opts: { prefix?: string; level?: LogLevel } = {},
): Diagnostics {
  const tag = `[${opts.prefix ?? "bsp"}]`;
  const level = opts.level ?? "info";
  return {
    info(message) {
      if (enabled(level, "info")) console.log(`${tag} ${message}`);
    },
    warn(message) {
      if (enabled(level, "warn")) console.warn(`${tag} ${message}`);
    },
    error(message) {
      if (enabled(level, "error")) console.error(`${tag} ${message}`);
    },
  };
}

export const silentDiagnostics: Diagnostics = {
  info() {},
  warn() {},
  error() {},
};
