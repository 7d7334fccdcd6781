// src/tree/traverse.ts
import { sameHandle, type Handle, type NodeEdge, type TreeNode } from "../interfaces.js";
import type { NodeArena } from "./links.js";

type Step<V> = (node: TreeNode<V>) => Handle | null;

/** Follow one link field from `start`, yielding every node reached (start included). */
export function* walkLinks<V>(
  nodes: NodeArena<V>,
  start: Handle | null,
  step: Step<V>
): IterableIterator<Handle> {
  let cur = start;
  while (cur) {
    const node = nodes.get(cur);
    if (!node) return; // removed mid-iteration
    yield cur;
    cur = step(node);
  }
}

function advance<V>(nodes: NodeArena<V>, root: Handle, edge: NodeEdge): NodeEdge | null {
  const node = nodes.get(edge.node);
  if (!node) return null;

  if (edge.kind === "start") {
    return node.firstChild
      ? { kind: "start", node: node.firstChild, depth: edge.depth + 1 }
      : { kind: "end", node: edge.node, depth: edge.depth };
  }

  if (sameHandle(edge.node, root)) return null;
  if (node.nextSibling) return { kind: "start", node: node.nextSibling, depth: edge.depth };
  // A missing parent here means the tree changed under us; stop rather than throw.
  if (node.parent) return { kind: "end", node: node.parent, depth: edge.depth - 1 };
  return null;
}

/**
 * Pre-order start/end edge walk of `root`'s subtree, without recursion.
 * Each node yields a start edge before its descendants and an end edge after them.
 */
export function* traverse<V>(nodes: NodeArena<V>, root: Handle): IterableIterator<NodeEdge> {
  let next: NodeEdge | null = { kind: "start", node: root, depth: 0 };
  while (next) {
    const edge: NodeEdge = next;
    if (!nodes.contains(edge.node)) return;
    next = advance(nodes, root, edge);
    yield edge;
  }
}

export function* descendants<V>(nodes: NodeArena<V>, root: Handle): IterableIterator<Handle> {
  for (const edge of traverse(nodes, root)) {
    if (edge.kind === "start") yield edge.node;
  }
}

export function* descendantsWithDepth<V>(
  nodes: NodeArena<V>,
  root: Handle
): IterableIterator<[Handle, number]> {
  for (const edge of traverse(nodes, root)) {
    if (edge.kind === "start") yield [edge.node, edge.depth];
  }
}
