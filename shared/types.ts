// --- Window & screen types ---

/** Opaque window token, supplied by the window system and compared with === */
export type WindowId = number | string;

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Anything the layout can place on screen */
export interface LayoutWindow {
  identifier(): WindowId;
}

/** Process-wide focus query, provided by the window system */
export interface FocusSource<W extends LayoutWindow = LayoutWindow> {
  currentlyFocused(): W | null;
}

export interface Screen {
  /** Frame minus menu bar, dock and other reserved chrome */
  usableArea(): Rect;
}

// --- Layout output ---

export type Dimension = "horizontal" | "vertical";

export interface ResizeRules {
  isMain: boolean;
  unconstrainedDimension: Dimension;
  scaleFactor: number;
}

export interface FrameAssignment<W extends LayoutWindow = LayoutWindow> {
  frame: Rect;
  window: W;
  screenFrame: Rect;
  resizeRules: ResizeRules;
}
