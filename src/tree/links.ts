// src/tree/links.ts
import type { Arena } from "../core/arena.js";
import { TreeError } from "../core/errors.js";
import { formatHandle, sameHandle, type Handle, type TreeNode } from "../interfaces.js";

export type NodeArena<V> = Arena<TreeNode<V>>;

export function emptyNode<V>(data: V): TreeNode<V> {
  return {
    parent: null,
    previousSibling: null,
    nextSibling: null,
    firstChild: null,
    lastChild: null,
    data,
  };
}

export function nodeOrThrow<V>(nodes: NodeArena<V>, h: Handle, op: string): TreeNode<V> {
  const node = nodes.get(h);
  if (!node) throw new TreeError("STALE_HANDLE", `${op}: node ${formatHandle(h)} is not in the tree`);
  return node;
}

/**
 * Close the gap a node leaves in its parent's child list, given the links it had.
 * Works from last-known values, so the node itself may already be gone.
 */
export function relinkNeighbours<V>(
  nodes: NodeArena<V>,
  parent: Handle | null,
  prev: Handle | null,
  next: Handle | null
) {
  const parentNode = parent ? nodes.get(parent) : undefined;

  const nextNode = next ? nodes.get(next) : undefined;
  if (nextNode) nextNode.previousSibling = prev;
  else if (parentNode) parentNode.lastChild = prev;

  const prevNode = prev ? nodes.get(prev) : undefined;
  if (prevNode) prevNode.nextSibling = next;
  else if (parentNode) parentNode.firstChild = next;
}

/** Unlink from parent and siblings; the node keeps its own children. */
export function detachFromParent<V>(nodes: NodeArena<V>, h: Handle) {
  const node = nodes.get(h);
  if (!node) return;

  const parent = node.parent;
  const prev = node.previousSibling;
  const next = node.nextSibling;
  if (!parent && !prev && !next) return;

  node.parent = null;
  node.previousSibling = null;
  node.nextSibling = null;
  relinkNeighbours(nodes, parent, prev, next);
}

/** Link an already-detached child as the parent's last child. */
export function appendChildAtEnd<V>(nodes: NodeArena<V>, parent: Handle, child: Handle) {
  const [p, c] = nodes.getPair(parent, child);
  if (!p) throw new TreeError("STALE_HANDLE", `appendChild: parent ${formatHandle(parent)} is not in the tree`);
  if (!c) throw new TreeError("STALE_HANDLE", `appendChild: child ${formatHandle(child)} is not in the tree`);

  c.parent = parent;
  const tail = p.lastChild;
  p.lastChild = child;

  const tailNode = tail ? nodes.get(tail) : undefined;
  if (tail && tailNode) {
    c.previousSibling = tail;
    tailNode.nextSibling = child;
  } else {
    p.firstChild = child;
  }
}

/** True when `maybeAncestor` is a strict ancestor of `node`. */
export function isAncestor<V>(nodes: NodeArena<V>, maybeAncestor: Handle, node: Handle): boolean {
  if (sameHandle(maybeAncestor, node)) return false;
  let cur = nodes.get(node)?.parent ?? null;
  for (let hops = 0; cur && hops < nodes.size; hops++) {
    if (sameHandle(cur, maybeAncestor)) return true;
    cur = nodes.get(cur)?.parent ?? null;
  }
  return false;
}
