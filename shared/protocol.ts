// Window change notifications fed to the layout engine

import type { LayoutWindow } from "./types";

export interface WindowAdded<W> {
  type: "add";
  window: W;
}

export interface WindowRemoved<W> {
  type: "remove";
  window: W;
}

export interface FocusChanged<W> {
  type: "focus_changed";
  window: W;
}

export interface WindowsSwapped<W> {
  type: "swap";
  window: W;
  otherWindow: W;
}

export interface SpaceChanged {
  type: "space_change";
}

export interface UnknownChange {
  type: "unknown";
}

export type WindowChange<W extends LayoutWindow = LayoutWindow> =
  | WindowAdded<W>
  | WindowRemoved<W>
  | FocusChanged<W>
  | WindowsSwapped<W>
  | SpaceChanged
  | UnknownChange;
