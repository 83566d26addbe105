/**
 * Binary space partitioning tree over window ids.
 *
 * Nodes live in an arena and refer to each other by integer handle, so parent
 * back-references are plain indices rather than owning pointers. A node is
 * either a leaf holding one window id or a split holding exactly two children.
 * The only identifier-less leaf is the root of an empty tree.
 */

import type { WindowId } from "../shared/types";
import { silentDiagnostics, type Diagnostics } from "./diagnostics";

export type NodeHandle = number;

export interface LeafNode {
  type: "leaf";
  parent: NodeHandle | null;
  windowId: WindowId | null;
}

export interface SplitNode {
  type: "split";
  parent: NodeHandle | null;
  left: NodeHandle;
  right: NodeHandle;
}

export type TreeNode = LeafNode | SplitNode;

/** Read-only access to a tree, as needed by the partitioner */
export interface TreeView {
  readonly root: NodeHandle;
  node(handle: NodeHandle): Readonly<TreeNode> | undefined;
}

export type TreeSnapshot =
  | { type: "leaf"; id: WindowId }
  | { type: "split"; left: TreeSnapshot; right: TreeSnapshot };

export class PartitionTree implements TreeView {
  private slots: Array<TreeNode | undefined> = [];
  private freeHandles: NodeHandle[] = [];
  private rootHandle: NodeHandle;

  constructor(private diagnostics: Diagnostics = silentDiagnostics) {
    this.rootHandle = this.alloc({ type: "leaf", parent: null, windowId: null });
  }

  get root(): NodeHandle {
    return this.rootHandle;
  }

  node(handle: NodeHandle): Readonly<TreeNode> | undefined {
    return this.slots[handle];
  }

  get isEmpty(): boolean {
    const root = this.at(this.rootHandle);
    return root.type === "leaf" && root.windowId === null;
  }

  get size(): number {
    return this.orderedIds().length;
  }

  /** Number of live arena slots (leaves + splits) */
  get allocated(): number {
    return this.slots.length - this.freeHandles.length;
  }

  // --- Lookup & traversal ---

  /** Depth-first, left before right; first leaf holding `id` */
  find(id: WindowId): NodeHandle | null {
    return this.findFrom(this.rootHandle, id);
  }

  has(id: WindowId): boolean {
    return this.find(id) !== null;
  }

  /** Leaf ids in left-to-right order */
  orderedIds(): WindowId[] {
    const ids: WindowId[] = [];
    this.collect(this.rootHandle, ids);
    return ids;
  }

  snapshot(): TreeSnapshot | null {
    if (this.isEmpty) return null;
    return this.snapshotFrom(this.rootHandle);
  }

  // --- Insertion ---

  /** Insert as the rightmost leaf */
  insertAtTail(id: WindowId): void {
    let handle = this.rootHandle;
    let node = this.at(handle);
    while (node.type === "split") {
      handle = node.right;
      node = this.at(handle);
    }
    this.splitLeaf(handle, id);
  }

  /**
   * Insert `id` as the immediate in-order successor of `anchorId`.
   * Returns false (and changes nothing) when the tree is non-empty and the
   * anchor is not in it.
   */
  insertAtAnchor(id: WindowId, anchorId: WindowId): boolean {
    if (this.isEmpty) {
      this.splitLeaf(this.rootHandle, id);
      return true;
    }
    const anchor = this.find(anchorId);
    if (anchor === null) return false;
    this.splitLeaf(anchor, id);
    return true;
  }

  // --- Removal ---

  /**
   * Remove the leaf holding `id` and collapse its parent split.
   * Removing the only window leaves an empty tree.
   */
  remove(id: WindowId): boolean {
    const handle = this.find(id);
    if (handle === null) {
      this.diagnostics.warn(`Trying to remove window not in tree: ${id}`);
      return false;
    }

    const leaf = this.at(handle);
    if (leaf.parent === null) {
      this.slots[handle] = { type: "leaf", parent: null, windowId: null };
      return true;
    }

    const parentHandle = leaf.parent;
    const parent = this.splitAt(parentHandle);
    const siblingHandle = parent.left === handle ? parent.right : parent.left;
    const sibling = this.at(siblingHandle);

    if (parent.parent === null) {
      // Parent is the root: it takes over the sibling's content in place
      if (sibling.type === "leaf") {
        this.slots[parentHandle] = { type: "leaf", parent: null, windowId: sibling.windowId };
      } else {
        this.slots[parentHandle] = {
          type: "split",
          parent: null,
          left: sibling.left,
          right: sibling.right,
        };
        this.at(sibling.left).parent = parentHandle;
        this.at(sibling.right).parent = parentHandle;
      }
      this.release(siblingHandle);
    } else {
      this.replaceChild(parent.parent, parentHandle, siblingHandle);
      sibling.parent = parent.parent;
      this.release(parentHandle);
    }

    this.release(handle);
    return true;
  }

  // --- Swap ---

  /** Exchange the positions of two windows. Both must be present. */
  swap(a: WindowId, b: WindowId): boolean {
    const first = this.find(a);
    const second = this.find(b);
    if (first === null || second === null) {
      this.diagnostics.error(`Tried to perform an unbalanced window swap: ${a} <-> ${b}`);
      return false;
    }
    this.leafAt(first).windowId = b;
    this.leafAt(second).windowId = a;
    return true;
  }

  // --- Invariant checking ---

  /** Every structural problem found; empty when the tree is well formed */
  validate(): string[] {
    const problems: string[] = [];
    const visited = new Set<NodeHandle>();
    const root = this.slots[this.rootHandle];

    if (!root) return [`root handle ${this.rootHandle} is empty`];
    if (root.parent !== null) problems.push("root has a parent");

    const stack: Array<{ handle: NodeHandle; parent: NodeHandle | null }> = [
      { handle: this.rootHandle, parent: null },
    ];
    for (let next = stack.pop(); next; next = stack.pop()) {
      const { handle, parent } = next;
      const node = this.slots[handle];
      if (!node) {
        problems.push(`dangling handle ${handle}`);
        continue;
      }
      if (visited.has(handle)) {
        problems.push(`node ${handle} reachable twice`);
        continue;
      }
      visited.add(handle);
      if (node.parent !== parent) {
        problems.push(`node ${handle} has parent ${node.parent}, expected ${parent}`);
      }
      if (node.type === "leaf") {
        if (node.windowId === null && handle !== this.rootHandle) {
          problems.push(`leaf ${handle} has no window id`);
        }
      } else {
        stack.push({ handle: node.right, parent: handle });
        stack.push({ handle: node.left, parent: handle });
      }
    }

    if (visited.size !== this.allocated) {
      problems.push(`${this.allocated - visited.size} unreachable node(s)`);
    }
    return problems;
  }

  isValid(): boolean {
    return this.validate().length === 0;
  }

  // --- Internals ---

  /**
   * Split primitive. The empty root just takes the id. Otherwise the leaf at
   * `handle` keeps its id and becomes the left child of a new split whose
   * right child holds `id`.
   */
  private splitLeaf(handle: NodeHandle, id: WindowId): void {
    const target = this.leafAt(handle);
    if (target.windowId === null && target.parent === null) {
      target.windowId = id;
      return;
    }

    const oldParent = target.parent;
    const split = this.alloc({ type: "split", parent: oldParent, left: handle, right: -1 });
    const added = this.alloc({ type: "leaf", parent: split, windowId: id });
    this.splitAt(split).right = added;

    if (oldParent === null) {
      this.rootHandle = split;
    } else {
      this.replaceChild(oldParent, handle, split);
    }
    target.parent = split;
  }

  private replaceChild(parentHandle: NodeHandle, from: NodeHandle, to: NodeHandle): void {
    const parent = this.splitAt(parentHandle);
    if (parent.left === from) {
      parent.left = to;
    } else if (parent.right === from) {
      parent.right = to;
    } else {
      throw new Error(`node ${from} is not a child of ${parentHandle}`);
    }
  }

  private findFrom(handle: NodeHandle, id: WindowId): NodeHandle | null {
    const node = this.slots[handle];
    if (!node) return null;
    if (node.type === "leaf") return node.windowId === id ? handle : null;
    return this.findFrom(node.left, id) ?? this.findFrom(node.right, id);
  }

  private collect(handle: NodeHandle, out: WindowId[]): void {
    const node = this.slots[handle];
    if (!node) return;
    if (node.type === "leaf") {
      if (node.windowId !== null) out.push(node.windowId);
      return;
    }
    this.collect(node.left, out);
    this.collect(node.right, out);
  }

  private snapshotFrom(handle: NodeHandle): TreeSnapshot {
    const node = this.at(handle);
    if (node.type === "leaf") {
      if (node.windowId === null) throw new Error(`leaf ${handle} has no window id`);
      return { type: "leaf", id: node.windowId };
    }
    return { type: "split", left: this.snapshotFrom(node.left), right: this.snapshotFrom(node.right) };
  }

  private alloc(node: TreeNode): NodeHandle {
    const reused = this.freeHandles.pop();
    if (reused !== undefined) {
      this.slots[reused] = node;
      return reused;
    }
    this.slots.push(node);
    return this.slots.length - 1;
  }

  private release(handle: NodeHandle): void {
    this.slots[handle] = undefined;
    this.freeHandles.push(handle);
  }

  private at(handle: NodeHandle): TreeNode {
    const node = this.slots[handle];
    if (!node) throw new Error(`no node at handle ${handle}`);
    return node;
  }

  private leafAt(handle: NodeHandle): LeafNode {
    const node = this.at(handle);
    if (node.type !== "leaf") throw new Error(`node ${handle} is not a leaf`);
    return node;
  }

  private splitAt(handle: NodeHandle): SplitNode {
    const node = this.at(handle);
    if (node.type !== "split") throw new Error(`node ${handle} is not a split`);
    return node;
  }
}
