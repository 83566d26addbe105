import { describe, it, expect, vi } from "vitest";
import { partition, splitRect, DEFAULT_RESIZE_RULES } from "./partitioner";
import { PartitionTree, type TreeNode, type TreeView } from "./partition-tree";
import type { LayoutWindow, Rect, WindowId } from "../shared/types";

class TestWindow implements LayoutWindow {
  constructor(readonly id: WindowId) {}
  identifier(): WindowId {
    return this.id;
  }
}

function windowsFor(ids: WindowId[]): Map<WindowId, TestWindow> {
  return new Map(ids.map((id) => [id, new TestWindow(id)]));
}

function framesById(tree: PartitionTree, screen: Rect): Map<WindowId, Rect> {
  const result = partition(tree, screen, windowsFor(tree.orderedIds()));
  return new Map(result.map((a) => [a.window.id, a.frame]));
}

function area(r: Rect): number {
  return r.width * r.height;
}

function overlaps(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.width && b.x < a.x + a.width && a.y < b.y + b.height && b.y < a.y + a.height;
}

function expectExactTiling(frames: Rect[], screen: Rect) {
  const total = frames.reduce((sum, r) => sum + area(r), 0);
  expect(total).toBe(area(screen));
  for (const r of frames) {
    expect(r.x).toBeGreaterThanOrEqual(screen.x);
    expect(r.y).toBeGreaterThanOrEqual(screen.y);
    expect(r.x + r.width).toBeLessThanOrEqual(screen.x + screen.width);
    expect(r.y + r.height).toBeLessThanOrEqual(screen.y + screen.height);
  }
  for (let i = 0; i < frames.length; i++) {
    for (let j = i + 1; j < frames.length; j++) {
      if (overlaps(frames[i], frames[j])) {
        throw new Error(`frames ${i} and ${j} overlap`);
      }
    }
  }
}

/** A tree whose every leaf sits at `depth` */
function balancedTree(depth: number): PartitionTree {
  const tree = new PartitionTree();
  let nextId = 1;
  tree.insertAtTail(nextId++);
  for (let level = 0; level < depth; level++) {
    for (const id of tree.orderedIds()) tree.insertAtAnchor(nextId++, id);
  }
  return tree;
}

/** Right spine of `depth` splits, as built by tail insertion */
function spineTree(depth: number): PartitionTree {
  const tree = new PartitionTree();
  for (let id = 1; id <= depth + 1; id++) tree.insertAtTail(id);
  return tree;
}

describe("splitRect", () => {
  it("splits a wide rectangle into left and right halves", () => {
    expect(splitRect({ x: 0, y: 0, width: 1000, height: 600 })).toEqual([
      { x: 0, y: 0, width: 500, height: 600 },
      { x: 500, y: 0, width: 500, height: 600 },
    ]);
  });

  it("splits a tall rectangle into top and bottom halves", () => {
    expect(splitRect({ x: 10, y: 20, width: 400, height: 900 })).toEqual([
      { x: 10, y: 20, width: 400, height: 450 },
      { x: 10, y: 470, width: 400, height: 450 },
    ]);
  });

  it("splits a square top and bottom", () => {
    expect(splitRect({ x: 0, y: 0, width: 800, height: 800 })).toEqual([
      { x: 0, y: 0, width: 800, height: 400 },
      { x: 0, y: 400, width: 800, height: 400 },
    ]);
  });
});

describe("partition", () => {
  it("returns nothing for an empty tree", () => {
    const tree = new PartitionTree();
    expect(partition(tree, { x: 0, y: 0, width: 100, height: 100 }, new Map())).toEqual([]);
  });

  it("gives a single window the whole screen", () => {
    const tree = spineTree(0);
    const screen = { x: 0, y: 25, width: 1440, height: 875 };
    const [assignment] = partition(tree, screen, windowsFor([1]));
    expect(assignment.frame).toEqual(screen);
    expect(assignment.screenFrame).toEqual(screen);
    expect(assignment.resizeRules).toEqual({ isMain: true, unconstrainedDimension: "horizontal", scaleFactor: 1 });
  });

  it("splits two windows side by side on a wide screen", () => {
    const tree = new PartitionTree();
    tree.insertAtTail("A");
    tree.insertAtTail("B");
    const result = partition(tree, { x: 0, y: 0, width: 1000, height: 600 }, windowsFor(["A", "B"]));
    expect(result.map((a) => [a.window.id, a.frame])).toEqual([
      ["A", { x: 0, y: 0, width: 500, height: 600 }],
      ["B", { x: 500, y: 0, width: 500, height: 600 }],
    ]);
  });

  it("lays out three tail-inserted windows", () => {
    const tree = new PartitionTree();
    for (const id of ["A", "B", "C"]) tree.insertAtTail(id);
    const screen = { x: 0, y: 0, width: 1200, height: 800 };
    const result = partition(tree, screen, windowsFor(["A", "B", "C"]));

    expect(result.map((a) => [a.window.id, a.frame])).toEqual([
      ["A", { x: 0, y: 0, width: 600, height: 800 }],
      ["B", { x: 600, y: 0, width: 600, height: 400 }],
      ["C", { x: 600, y: 400, width: 600, height: 400 }],
    ]);
    expectExactTiling(result.map((a) => a.frame), screen);
  });

  it("emits in breadth-first order", () => {
    const tree = new PartitionTree();
    for (const id of ["A", "B", "C"]) tree.insertAtTail(id);
    tree.insertAtAnchor("D", "A");
    tree.insertAtAnchor("E", "D");
    // in order: A D E B C; A sits one level above D and E
    const result = partition(tree, { x: 0, y: 0, width: 1600, height: 900 }, windowsFor(["A", "B", "C", "D", "E"]));
    expect(result.map((a) => a.window.id)).toEqual(["A", "B", "C", "D", "E"]);
  });

  it("gives each assignment its own resize rules", () => {
    const tree = spineTree(1);
    const [first, second] = partition(tree, { x: 0, y: 0, width: 10, height: 10 }, windowsFor([1, 2]));
    expect(first.resizeRules).not.toBe(second.resizeRules);
    expect(first.resizeRules).not.toBe(DEFAULT_RESIZE_RULES);
  });

  it("skips and reports ids with no window", () => {
    const tree = new PartitionTree();
    for (const id of ["A", "B", "C"]) tree.insertAtTail(id);
    const diagnostics = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const result = partition(tree, { x: 0, y: 0, width: 1200, height: 800 }, windowsFor(["A", "C"]), diagnostics);

    expect(result.map((a) => [a.window.id, a.frame])).toEqual([
      ["A", { x: 0, y: 0, width: 600, height: 800 }],
      ["C", { x: 600, y: 400, width: 600, height: 400 }],
    ]);
    expect(diagnostics.warn).toHaveBeenCalledTimes(1);
    expect(diagnostics.warn).toHaveBeenCalledWith("Could not find window for ID: B");
  });

  it("skips a malformed split but lays out its siblings", () => {
    // root(0) -> leaf A(1), split(2) -> leaf B(3), dangling 99
    const nodes: Record<number, TreeNode> = {
      0: { type: "split", parent: null, left: 1, right: 2 },
      1: { type: "leaf", parent: 0, windowId: "A" },
      2: { type: "split", parent: 0, left: 3, right: 99 },
      3: { type: "leaf", parent: 2, windowId: "B" },
    };
    const view: TreeView = { root: 0, node: (handle) => nodes[handle] };
    const diagnostics = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const result = partition(view, { x: 0, y: 0, width: 1000, height: 500 }, windowsFor(["A", "B"]), diagnostics);

    expect(result.map((a) => [a.window.id, a.frame])).toEqual([
      ["A", { x: 0, y: 0, width: 500, height: 500 }],
    ]);
    expect(diagnostics.error).toHaveBeenCalledTimes(1);
    expect(diagnostics.error).toHaveBeenCalledWith("Encountered an invalid node");
  });

  it("keeps the rectangle set when windows swap", () => {
    const tree = spineTree(3);
    const screen = { x: 0, y: 0, width: 1920, height: 1080 };
    const before = framesById(tree, screen);
    tree.swap(1, 4);
    const after = framesById(tree, screen);

    expect(after.get(1)).toEqual(before.get(4));
    expect(after.get(4)).toEqual(before.get(1));
    expect(after.get(2)).toEqual(before.get(2));
    expect(new Set([...after.values()].map((r) => JSON.stringify(r)))).toEqual(
      new Set([...before.values()].map((r) => JSON.stringify(r))),
    );
  });

  describe("tiling", () => {
    const screen = { x: 0, y: 23, width: 1920, height: 1057 };

    for (let depth = 0; depth <= 10; depth++) {
      it(`tiles the screen exactly with a right spine of depth ${depth}`, () => {
        const tree = spineTree(depth);
        const frames = partition(tree, screen, windowsFor(tree.orderedIds())).map((a) => a.frame);
        expect(frames).toHaveLength(depth + 1);
        expectExactTiling(frames, screen);
      });

      it(`tiles the screen exactly with a balanced tree of depth ${depth}`, () => {
        const tree = balancedTree(depth);
        const frames = partition(tree, screen, windowsFor(tree.orderedIds())).map((a) => a.frame);
        expect(frames).toHaveLength(2 ** depth);
        expectExactTiling(frames, screen);
      });
    }
  });
});
