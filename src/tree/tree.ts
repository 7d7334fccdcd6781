// src/tree/tree.ts
import { Arena } from "../core/arena.js";
import { TreeError } from "../core/errors.js";
import {
  formatHandle,
  sameHandle,
  type Handle,
  type InsertResult,
  type NodeEdge,
  type TreeConfig,
  type TreeNode,
} from "../interfaces.js";
import {
  appendChildAtEnd,
  detachFromParent,
  emptyNode,
  isAncestor,
  nodeOrThrow,
  relinkNeighbours,
  type NodeArena,
} from "./links.js";
import { descendants, descendantsWithDepth, traverse, walkLinks } from "./traverse.js";

const DEFAULT_CAPACITY = 4;

/**
 * N-ary tree whose nodes live in one generation-checked arena.
 *
 * Topology is intrusive: every record carries its parent, first/last child and
 * previous/next sibling handles. Removing a node removes its whole subtree and
 * leaves every handle into that subtree stale.
 */
export class Tree<V> {
  protected nodes: NodeArena<V>;
  protected _root: Handle | null = null;

  constructor(cfg: TreeConfig = {}) {
    this.nodes = new Arena<TreeNode<V>>(cfg.initialCapacity ?? DEFAULT_CAPACITY);
  }

  static withCapacity<V>(n: number): Tree<V> {
    return new Tree<V>({ initialCapacity: n });
  }

  get root(): Handle | null { return this._root; }
  get size(): number { return this.nodes.size; }
  get isEmpty(): boolean { return this.nodes.size === 0; }
  get capacity(): number { return this.nodes.capacity; }

  reserve(additional: number) {
    this.nodes.reserve(additional);
  }

  clear() {
    this.nodes.clear();
    this._root = null;
  }

  // ----- insertion -----

  insert(data: V, parent?: Handle): Handle {
    if (parent) nodeOrThrow(this.nodes, parent, "insert");
    const node = this.nodes.insert(emptyNode(data));
    if (parent) appendChildAtEnd(this.nodes, parent, node);
    return node;
  }

  /** Like insert, but never grows the arena; a full tree hands `data` back. */
  tryInsert(data: V, parent?: Handle): InsertResult<V> {
    if (parent) nodeOrThrow(this.nodes, parent, "tryInsert");
    const res = this.nodes.tryInsert(emptyNode(data));
    if (!res.ok) return { ok: false, data: res.value.data };
    if (parent) appendChildAtEnd(this.nodes, parent, res.handle);
    return { ok: true, node: res.handle };
  }

  insertRoot(data: V): Handle {
    this.assertNoRoot();
    const node = this.nodes.insert(emptyNode(data));
    this._root = node;
    return node;
  }

  tryInsertRoot(data: V): InsertResult<V> {
    this.assertNoRoot();
    const res = this.tryInsert(data);
    if (res.ok) this._root = res.node;
    return res;
  }

  protected assertNoRoot() {
    if (this._root) throw new TreeError("ROOT_EXISTS", `A root node already exists (${formatHandle(this._root)})`);
  }

  // ----- topology -----

  /**
   * Make `child` (with its subtree) the last child of `parent`, moving it if it is
   * attached elsewhere. Nothing changes when validation fails.
   */
  appendChild(parent: Handle, child: Handle) {
    nodeOrThrow(this.nodes, parent, "appendChild");
    nodeOrThrow(this.nodes, child, "appendChild");
    if (sameHandle(parent, child)) {
      throw new TreeError("SELF_APPEND", `appendChild: cannot append ${formatHandle(child)} to itself`);
    }
    if (isAncestor(this.nodes, child, parent)) {
      throw new TreeError("CYCLE", "appendChild: target parent is a descendant of the child");
    }

    detachFromParent(this.nodes, child);
    appendChildAtEnd(this.nodes, parent, child);
    if (sameHandle(this._root, child)) this._root = null;
  }

  /** Unlink from parent and siblings without deleting anything. */
  detach(node: Handle) {
    detachFromParent(this.nodes, node);
  }

  /** Delete `node` and its whole subtree, returning the node's payload. */
  remove(node: Handle): V | undefined {
    if (!this.nodes.contains(node)) return undefined;

    // Collect before touching anything: the walk reads the links we are about to cut.
    const doomed = Array.from(descendants(this.nodes, node)).slice(1);

    const removed = this.nodes.remove(node);
    if (!removed) return undefined;
    relinkNeighbours(this.nodes, removed.parent, removed.previousSibling, removed.nextSibling);

    for (const d of doomed) this.nodes.remove(d);

    if (sameHandle(this._root, node)) this._root = null;
    return removed.data;
  }

  // ----- lookup -----

  contains(node: Handle): boolean {
    return this.nodes.contains(node);
  }

  get(node: Handle): V | undefined {
    return this.nodes.get(node)?.data;
  }

  set(node: Handle, data: V): boolean {
    const rec = this.nodes.get(node);
    if (!rec) return false;
    rec.data = data;
    return true;
  }

  update(node: Handle, fn: (data: V) => V): boolean {
    const rec = this.nodes.get(node);
    if (!rec) return false;
    rec.data = fn(rec.data);
    return true;
  }

  /** Payload of a node known to be live; throws on a stale handle. */
  at(node: Handle): V {
    return nodeOrThrow(this.nodes, node, "at").data;
  }

  setAt(node: Handle, data: V) {
    nodeOrThrow(this.nodes, node, "setAt").data = data;
  }

  parent(node: Handle): Handle | null { return this.nodes.get(node)?.parent ?? null; }
  firstChild(node: Handle): Handle | null { return this.nodes.get(node)?.firstChild ?? null; }
  lastChild(node: Handle): Handle | null { return this.nodes.get(node)?.lastChild ?? null; }
  previousSibling(node: Handle): Handle | null { return this.nodes.get(node)?.previousSibling ?? null; }
  nextSibling(node: Handle): Handle | null { return this.nodes.get(node)?.nextSibling ?? null; }

  isAncestor(maybeAncestor: Handle, node: Handle): boolean {
    return isAncestor(this.nodes, maybeAncestor, node);
  }

  childCount(node: Handle): number {
    let n = 0;
    for (const _ of this.children(node)) n++;
    return n;
  }

  describe(node: Handle): string {
    const rec = nodeOrThrow(this.nodes, node, "describe");
    return (
      `Parent: ${formatHandle(rec.parent)}, ` +
      `Previous sibling: ${formatHandle(rec.previousSibling)}, ` +
      `Next sibling: ${formatHandle(rec.nextSibling)}, ` +
      `First child: ${formatHandle(rec.firstChild)}, ` +
      `Last child: ${formatHandle(rec.lastChild)}`
    );
  }

  // ----- traversal -----
  // The start node must be live; links that stop resolving end the walk.

  children(node: Handle): IterableIterator<Handle> {
    const rec = nodeOrThrow(this.nodes, node, "children");
    return walkLinks(this.nodes, rec.firstChild, (n) => n.nextSibling);
  }

  /** `node` first, then its earlier siblings nearest-first. */
  precedingSiblings(node: Handle): IterableIterator<Handle> {
    nodeOrThrow(this.nodes, node, "precedingSiblings");
    return walkLinks(this.nodes, node, (n) => n.previousSibling);
  }

  /** `node` first, then its later siblings. */
  followingSiblings(node: Handle): IterableIterator<Handle> {
    nodeOrThrow(this.nodes, node, "followingSiblings");
    return walkLinks(this.nodes, node, (n) => n.nextSibling);
  }

  /** `node` first, then parent, grandparent, ... */
  ancestors(node: Handle): IterableIterator<Handle> {
    nodeOrThrow(this.nodes, node, "ancestors");
    return walkLinks(this.nodes, node, (n) => n.parent);
  }

  traverse(node: Handle): IterableIterator<NodeEdge> {
    nodeOrThrow(this.nodes, node, "traverse");
    return traverse(this.nodes, node);
  }

  /** Pre-order: `node` first, each node before its descendants. */
  descendants(node: Handle): IterableIterator<Handle> {
    nodeOrThrow(this.nodes, node, "descendants");
    return descendants(this.nodes, node);
  }

  descendantsWithDepth(node: Handle): IterableIterator<[Handle, number]> {
    nodeOrThrow(this.nodes, node, "descendantsWithDepth");
    return descendantsWithDepth(this.nodes, node);
  }
}
