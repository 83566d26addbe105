/**
 * Replay harness: a JSON script of window events stands in for a real window
 * system. Events are validated, applied to a LayoutEngine in order, and the
 * final layout is computed.
 */

import type { FocusSource, FrameAssignment, LayoutWindow, Rect, Screen, WindowId } from "../shared/types";
import type { WindowChange } from "../shared/protocol";
import { LayoutEngine } from "./layout-engine";
import { DEFAULT_SCREEN } from "./config";
import { silentDiagnostics, type Diagnostics } from "./diagnostics";

// --- Script format ---

export type ReplayEvent =
  | { type: "add" | "remove" | "focus"; window: WindowId }
  | { type: "swap"; window: WindowId; other: WindowId }
  | { type: "space_change" | "unknown" };

export interface ReplayScript {
  screen?: Rect;
  windows: WindowId[];
  events: ReplayEvent[];
}

export class ReplayScriptError extends Error {
  constructor(message: string, readonly path: string) {
    super(`${path}: ${message}`);
    this.name = "ReplayScriptError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseWindowId(value: unknown, path: string): WindowId {
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number" && Number.isFinite(value)) return value;
  throw new ReplayScriptError("expected a window id (non-empty string or number)", path);
}

function parseRect(value: unknown, path: string): Rect {
  if (!isRecord(value)) throw new ReplayScriptError("expected an object", path);
  const num = (key: keyof Rect): number => {
    const v = value[key];
    if (typeof v !== "number" || !Number.isFinite(v)) {
      throw new ReplayScriptError("expected a number", `${path}.${key}`);
    }
    return v;
  };
  const rect = { x: num("x"), y: num("y"), width: num("width"), height: num("height") };
  if (rect.width < 0 || rect.height < 0) {
    throw new ReplayScriptError("width and height must not be negative", path);
  }
  return rect;
}

function parseEvent(value: unknown, path: string): ReplayEvent {
  if (!isRecord(value)) throw new ReplayScriptError("expected an object", path);
  const type = typeof value.type === "string" ? value.type : undefined;
  switch (type) {
    case "add":
    case "remove":
    case "focus":
      return { type, window: parseWindowId(value.window, `${path}.window`) };
    case "swap":
      return {
        type,
        window: parseWindowId(value.window, `${path}.window`),
        other: parseWindowId(value.other, `${path}.other`),
      };
    case "space_change":
    case "unknown":
      return { type };
    default:
      throw new ReplayScriptError(`unknown event type ${JSON.stringify(type)}`, `${path}.type`);
  }
}

export function parseScript(input: unknown): ReplayScript {
  if (!isRecord(input)) throw new ReplayScriptError("expected an object", "$");

  const events = input.events;
  if (!Array.isArray(events)) throw new ReplayScriptError("expected an array", "$.events");

  const windows = input.windows ?? [];
  if (!Array.isArray(windows)) throw new ReplayScriptError("expected an array", "$.windows");

  return {
    screen: input.screen === undefined ? undefined : parseRect(input.screen, "$.screen"),
    windows: windows.map((w, i) => parseWindowId(w, `$.windows[${i}]`)),
    events: events.map((e, i) => parseEvent(e, `$.events[${i}]`)),
  };
}

// --- Scripted window system ---

export class ScriptedWindow implements LayoutWindow {
  constructor(readonly id: WindowId) {}

  identifier(): WindowId {
    return this.id;
  }
}

/** Tracks open windows and focus the way a real window server would */
export class ScriptedWindowSystem implements FocusSource<ScriptedWindow> {
  private windows = new Map<WindowId, ScriptedWindow>();
  private focusedId: WindowId | null = null;

  open(id: WindowId): ScriptedWindow {
    let window = this.windows.get(id);
    if (!window) {
      window = new ScriptedWindow(id);
      this.windows.set(id, window);
    }
    return window;
  }

  /** Close a window; unknown ids still get a handle for the notification */
  close(id: WindowId): ScriptedWindow {
    const window = this.windows.get(id) ?? new ScriptedWindow(id);
    this.windows.delete(id);
    if (this.focusedId === id) this.focusedId = null;
    return window;
  }

  focus(id: WindowId): ScriptedWindow {
    const window = this.open(id);
    this.focusedId = id;
    return window;
  }

  lookup(id: WindowId): ScriptedWindow {
    return this.windows.get(id) ?? new ScriptedWindow(id);
  }

  list(): ScriptedWindow[] {
    return [...this.windows.values()];
  }

  currentlyFocused(): ScriptedWindow | null {
    if (this.focusedId === null) return null;
    return this.windows.get(this.focusedId) ?? null;
  }
}

export function toChange(event: ReplayEvent, system: ScriptedWindowSystem): WindowChange<ScriptedWindow> {
  switch (event.type) {
    case "add":
      return { type: "add", window: system.open(event.window) };
    case "remove":
      return { type: "remove", window: system.close(event.window) };
    case "focus":
      return { type: "focus_changed", window: system.focus(event.window) };
    case "swap":
      return { type: "swap", window: system.lookup(event.window), otherWindow: system.lookup(event.other) };
    case "space_change":
      return { type: "space_change" };
    case "unknown":
      return { type: "unknown" };
  }
}

// --- Runner ---

export interface ReplayOptions {
  screen?: Rect;
  diagnostics?: Diagnostics;
}

export interface ReplayResult {
  engine: LayoutEngine<ScriptedWindow>;
  assignments: FrameAssignment<ScriptedWindow>[];
  order: WindowId[];
  focused: WindowId | null;
  next: WindowId | null;
  previous: WindowId | null;
}

export function replay(script: ReplayScript, opts: ReplayOptions = {}): ReplayResult {
  const system = new ScriptedWindowSystem();
  const engine = new LayoutEngine<ScriptedWindow>({
    focus: system,
    diagnostics: opts.diagnostics ?? silentDiagnostics,
  });

  engine.seed(script.windows.map((id) => system.open(id)));
  for (const event of script.events) {
    engine.applyChange(toChange(event, system));
  }

  const frame = opts.screen ?? script.screen ?? DEFAULT_SCREEN;
  const screen: Screen = { usableArea: () => ({ ...frame }) };

  return {
    engine,
    assignments: engine.frameAssignments(system.list(), screen),
    order: engine.tree.orderedIds(),
    focused: system.currentlyFocused()?.identifier() ?? null,
    next: engine.nextClockwise(),
    previous: engine.nextCounterClockwise(),
  };
}

export function formatAssignment(assignment: FrameAssignment<ScriptedWindow>): string {
  const { x, y, width, height } = assignment.frame;
  return `${assignment.window.identifier()}\t${x},${y},${width},${height}`;
}
