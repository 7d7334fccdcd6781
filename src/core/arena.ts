// src/core/arena.ts
import { makeHandle, type Handle, type TryInsertResult } from "../interfaces.js";
import { TreeError } from "./errors.js";

const GROW = (n: number) => Math.max(2, n << 1);

/**
 * Slot storage addressed by (slot, generation) handles.
 *
 * A slot's generation is bumped whenever its record is removed (or the arena is
 * cleared), so a handle issued before that never validates again, even after the
 * slot is recycled. Growth copies the backing arrays; handles survive it because
 * they never hold a reference into them.
 */
export class Arena<T> {
  private _values: (T | undefined)[];
  private _occupied: Uint8Array;
  private _generation: Uint32Array;
  private _free: number[] = [];
  private _next = 0;
  private _size = 0;

  constructor(initialCapacity = 4) {
    const cap = Math.max(1, initialCapacity | 0);
    this._values = new Array<T | undefined>(cap).fill(undefined);
    this._occupied = new Uint8Array(cap);
    this._generation = new Uint32Array(cap);
  }

  get capacity() {
    return this._generation.length | 0;
  }
  get size() {
    return this._size | 0;
  }

  private growTo(newCap: number) {
    if (newCap <= this._generation.length) return;
    const occupied = new Uint8Array(newCap);
    occupied.set(this._occupied);
    const generation = new Uint32Array(newCap);
    generation.set(this._generation);
    for (let i = this._values.length; i < newCap; i++) this._values.push(undefined);
    this._occupied = occupied;
    this._generation = generation;
  }

  /** Next slot to hand out without growing, or -1 when full. */
  private claimSlot(): number {
    const recycled = this._free.pop();
    if (recycled !== undefined) return recycled;
    if (this._next < this.capacity) return this._next++;
    return -1;
  }

  private occupy(slot: number, value: T): Handle {
    this._values[slot] = value;
    this._occupied[slot] = 1;
    this._size++;
    return makeHandle(slot, this._generation[slot] ?? 0);
  }

  /** Insert, doubling capacity when full. */
  insert(value: T): Handle {
    let slot = this.claimSlot();
    if (slot < 0) {
      this.growTo(GROW(this.capacity));
      slot = this.claimSlot();
    }
    return this.occupy(slot, value);
  }

  /** Insert into existing capacity only; a full arena hands the value back. */
  tryInsert(value: T): TryInsertResult<T> {
    const slot = this.claimSlot();
    if (slot < 0) return { ok: false, value };
    return { ok: true, handle: this.occupy(slot, value) };
  }

  contains(h: Handle): boolean {
    const slot = h.slot;
    return (
      Number.isInteger(slot) &&
      slot >= 0 &&
      slot < this._generation.length &&
      this._occupied[slot] === 1 &&
      this._generation[slot] === h.generation
    );
  }

  get(h: Handle): T | undefined {
    return this.contains(h) ? this._values[h.slot] : undefined;
  }

  /** Both records at once; the two handles must name distinct slots. */
  getPair(a: Handle, b: Handle): [T | undefined, T | undefined] {
    if (a.slot === b.slot) {
      throw new TreeError("ALIASED_PAIR", `getPair: handles share slot ${a.slot}`);
    }
    return [this.get(a), this.get(b)];
  }

  remove(h: Handle): T | undefined {
    if (!this.contains(h)) return undefined;
    const slot = h.slot;
    const value = this._values[slot];
    this._values[slot] = undefined;
    this._occupied[slot] = 0;
    this._generation[slot] = ((this._generation[slot] ?? 0) + 1) >>> 0;
    this._free.push(slot);
    this._size--;
    return value;
  }

  /** Grow so that `additional` more records fit beyond the current capacity. */
  reserve(additional: number) {
    const n = Math.max(0, additional | 0);
    if (n > 0) this.growTo(this.capacity + n);
  }

  /** Drop every record, keep the storage, invalidate every outstanding handle. */
  clear() {
    for (let slot = 0; slot < this._next; slot++) {
      if (this._occupied[slot] !== 1) continue;
      this._values[slot] = undefined;
      this._occupied[slot] = 0;
      this._generation[slot] = ((this._generation[slot] ?? 0) + 1) >>> 0;
    }
    this._free = [];
    this._next = 0;
    this._size = 0;
  }

  /** Live handles in ascending slot order. */
  *handles(): IterableIterator<Handle> {
    for (let slot = 0; slot < this._next; slot++) {
      if (this._occupied[slot] === 1) yield makeHandle(slot, this._generation[slot] ?? 0);
    }
  }
}
