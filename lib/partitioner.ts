/** Breadth-first rectangle subdivision over a partition tree */

import type { FrameAssignment, LayoutWindow, Rect, ResizeRules, WindowId } from "../shared/types";
import type { NodeHandle, TreeView } from "./partition-tree";
import { silentDiagnostics, type Diagnostics } from "./diagnostics";

export const DEFAULT_RESIZE_RULES: Readonly<ResizeRules> = {
  isMain: true,
  unconstrainedDimension: "horizontal",
  scaleFactor: 1,
};

/**
 * Halve a rectangle along its longer side. Wider than tall gives left/right
 * halves; otherwise (square included) top/bottom.
 */
export function splitRect(rect: Rect): [Rect, Rect] {
  if (rect.width > rect.height) {
    const half = rect.width / 2;
    return [
      { x: rect.x, y: rect.y, width: half, height: rect.height },
      { x: rect.x + half, y: rect.y, width: half, height: rect.height },
    ];
  }
  const half = rect.height / 2;
  return [
    { x: rect.x, y: rect.y, width: rect.width, height: half },
    { x: rect.x, y: rect.y + half, width: rect.width, height: half },
  ];
}

/**
 * One frame per leaf whose id resolves in `windows`, in breadth-first order.
 * Unresolved ids and malformed splits are reported and skipped; the rest of
 * the tree still lays out.
 */
export function partition<W extends LayoutWindow>(
  tree: TreeView,
  screenFrame: Rect,
  windows: ReadonlyMap<WindowId, W>,
  diagnostics: Diagnostics = silentDiagnostics,
): FrameAssignment<W>[] {
  const assignments: FrameAssignment<W>[] = [];
  const queue: Array<{ handle: NodeHandle; frame: Rect }> = [{ handle: tree.root, frame: screenFrame }];

  for (let head = 0; head < queue.length; head++) {
    const { handle, frame } = queue[head];
    const node = tree.node(handle);

    if (!node) {
      diagnostics.error("Encountered an invalid node");
      continue;
    }

    if (node.type === "leaf") {
      if (node.windowId === null) continue; // empty tree
      const window = windows.get(node.windowId);
      if (!window) {
        diagnostics.warn(`Could not find window for ID: ${node.windowId}`);
        continue;
      }
      assignments.push({ frame, window, screenFrame, resizeRules: { ...DEFAULT_RESIZE_RULES } });
      continue;
    }

    if (!tree.node(node.left) || !tree.node(node.right)) {
      diagnostics.error("Encountered an invalid node");
      continue;
    }

    const [first, second] = splitRect(frame);
    queue.push({ handle: node.left, frame: first });
    queue.push({ handle: node.right, frame: second });
  }

  return assignments;
}
