/** Opaque (slot, generation) pair naming one record in an arena. */
export type Handle = Readonly<{
  slot: number;
  generation: number;
}>;

/** Intrusive links plus payload, one per arena slot. */
export interface TreeNode<V> {
  parent: Handle | null;
  previousSibling: Handle | null;
  nextSibling: Handle | null;
  firstChild: Handle | null;
  lastChild: Handle | null;
  data: V;
}

/** Outcome of a capacity-bounded insert: the handle, or the rejected value back. */
export type TryInsertResult<T> =
  | { ok: true; handle: Handle }
  | { ok: false; value: T };

export type InsertResult<V> =
  | { ok: true; node: Handle }
  | { ok: false; data: V };

/** Start/end edge of the pre-order walk; depth is relative to the walk's root. */
export type NodeEdge =
  | { kind: "start"; node: Handle; depth: number }
  | { kind: "end"; node: Handle; depth: number };

export interface TreeConfig {
  initialCapacity?: number; // default 4
}

export function makeHandle(slot: number, generation: number): Handle {
  return Object.freeze({ slot: slot | 0, generation: generation >>> 0 });
}

export function sameHandle(a: Handle | null | undefined, b: Handle | null | undefined): boolean {
  if (a == null || b == null) return a == null && b == null;
  return a.slot === b.slot && a.generation === b.generation;
}

export function formatHandle(h: Handle | null): string {
  return h ? `${h.slot}v${h.generation}` : "none";
}
