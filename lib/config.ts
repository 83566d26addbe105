import type { Rect } from "../shared/types";
import { isLogLevel, type LogLevel } from "./diagnostics";

export interface LayoutConfig {
  logLevel: LogLevel;
  screen: Rect;
}

export const DEFAULT_SCREEN: Rect = { x: 0, y: 0, width: 1920, height: 1080 };

export const DEFAULT_CONFIG: LayoutConfig = {
  logLevel: "info",
  screen: DEFAULT_SCREEN,
};

/** Partial screen override from JSON, e.g. BSP_SCREEN='{"width":2560}' */
export function parseScreen(json: string | undefined): Rect {
  if (!json) return { ...DEFAULT_SCREEN };
  let overrides: unknown;
  try {
    overrides = JSON.parse(json);
  } catch {
    return { ...DEFAULT_SCREEN };
  }
  if (typeof overrides !== "object" || overrides === null) return { ...DEFAULT_SCREEN };

  const screen = { ...DEFAULT_SCREEN };
  for (const key of ["x", "y", "width", "height"] as const) {
    const value: unknown = Reflect.get(overrides, key);
    if (typeof value === "number" && Number.isFinite(value)) screen[key] = value;
  }
  return screen;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LayoutConfig {
  const level = env.BSP_LOG_LEVEL?.toLowerCase();
  return {
    logLevel: level && isLogLevel(level) ? level : DEFAULT_CONFIG.logLevel,
    screen: parseScreen(env.BSP_SCREEN),
  };
}
