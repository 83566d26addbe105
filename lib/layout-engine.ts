/**
 * LayoutEngine: binary space partitioning layout for one screen.
 *
 * Owns the partition tree and the last-focused window, turns window change
 * notifications into tree mutations, and computes frame assignments.
 */

import type { FocusSource, FrameAssignment, LayoutWindow, Screen, WindowId } from "../shared/types";
import type { WindowChange } from "../shared/protocol";
import { PartitionTree } from "./partition-tree";
import { partition } from "./partitioner";
import { silentDiagnostics, type Diagnostics } from "./diagnostics";

export interface LayoutEngineOptions<W extends LayoutWindow> {
  focus: FocusSource<W>;
  diagnostics?: Diagnostics;
}

export class LayoutEngine<W extends LayoutWindow = LayoutWindow> {
  static readonly layoutName = "Binary Space Partitioning";
  static readonly layoutKey = "bsp";

  readonly tree: PartitionTree;
  private lastFocusedId: WindowId | null = null;
  private focus: FocusSource<W>;
  private diagnostics: Diagnostics;

  constructor(opts: LayoutEngineOptions<W>) {
    this.focus = opts.focus;
    this.diagnostics = opts.diagnostics ?? silentDiagnostics;
    this.tree = new PartitionTree(this.diagnostics);
  }

  get layoutDescription(): string {
    return this.lastFocusedId === null ? "none" : String(this.lastFocusedId);
  }

  /** Anchor for the next insertion */
  get lastFocused(): WindowId | null {
    return this.lastFocusedId;
  }

  /** Build the initial tree from windows already on screen */
  seed(windows: readonly W[]): void {
    for (const window of windows) {
      const id = window.identifier();
      if (this.tree.has(id)) continue;
      this.tree.insertAtTail(id);
    }
  }

  applyChange(change: WindowChange<W>): void {
    switch (change.type) {
      case "add":
        this.addWindow(change.window.identifier());
        break;
      case "remove": {
        const id = change.window.identifier();
        this.diagnostics.info(`remove: ${id}`);
        this.tree.remove(id);
        break;
      }
      case "focus_changed":
        this.lastFocusedId = change.window.identifier();
        break;
      case "swap":
        this.tree.swap(change.window.identifier(), change.otherWindow.identifier());
        break;
      case "space_change":
      case "unknown":
        break;
      default: {
        const unhandled: never = change;
        throw new Error(`Unhandled window change: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  nextClockwise(): WindowId | null {
    return this.step(1);
  }

  nextCounterClockwise(): WindowId | null {
    return this.step(-1);
  }

  frameAssignments(windows: readonly W[], screen: Screen): FrameAssignment<W>[] {
    if (windows.length === 0) return [];
    const byId = new Map<WindowId, W>();
    for (const window of windows) byId.set(window.identifier(), window);
    return partition(this.tree, screen.usableArea(), byId, this.diagnostics);
  }

  private addWindow(id: WindowId): void {
    if (this.tree.has(id)) {
      this.diagnostics.warn(`Trying to add a window already in the tree: ${id}`);
      return;
    }

    const anchor = this.lastFocusedId;
    if (anchor !== null && anchor !== id) {
      this.diagnostics.info(`insert ${id} at point: ${anchor}`);
      if (!this.tree.insertAtAnchor(id, anchor)) {
        this.diagnostics.warn(`Insertion point ${anchor} not in tree, ignoring ${id}`);
      }
      return;
    }

    this.diagnostics.info(`insert ${id} at end`);
    this.tree.insertAtTail(id);
  }

  private step(direction: 1 | -1): WindowId | null {
    const focused = this.focus.currentlyFocused();
    if (!focused) return null;

    const ordered = this.tree.orderedIds();
    const index = ordered.indexOf(focused.identifier());
    if (index === -1) return null;

    return ordered[(index + direction + ordered.length) % ordered.length];
  }
}
