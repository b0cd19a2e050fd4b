/***
 *
 * SparseSet — O(1) integer-key set with packed iteration
 *
 * Keys are non-negative integers (entity indices). `dense` holds the
 * members packed at 0..size-1; `sparse` maps key → dense position, or
 * EMPTY. Deletion moves the last member into the hole (swap-and-pop),
 * so member order is insertion/removal history, not key order.
 *
 ***/

import { EMPTY, DEFAULT_INITIAL_CAPACITY } from "utils/constants";
import { grow_number_array } from "utils/arrays";

export class SparseSet {
  private dense: number[] = [];
  private sparse: number[];

  constructor(initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    this.sparse = new Array(initial_capacity).fill(EMPTY);
  }

  get size(): number {
    return this.dense.length;
  }

  /** Live view of members. Valid indices: 0..size-1. Do not mutate. */
  get values(): readonly number[] {
    return this.dense;
  }

  has(key: number): boolean {
    return key >= 0 && key < this.sparse.length && this.sparse[key] !== EMPTY;
  }

  /** Add key. No-op if already present. */
  add(key: number): void {
    if (this.has(key)) return;
    if (key >= this.sparse.length) {
      this.sparse = grow_number_array(this.sparse, key + 1, EMPTY);
    }
    this.sparse[key] = this.dense.length;
    this.dense.push(key);
  }

  /**
   * Remove key via swap-and-pop. O(1).
   * Returns true if the key was present, false if it was absent.
   */
  delete(key: number): boolean {
    if (!this.has(key)) return false;
    const row = this.sparse[key];
    const last = this.dense[this.dense.length - 1];
    this.dense[row] = last;
    this.sparse[last] = row;
    this.dense.pop();
    this.sparse[key] = EMPTY;
    return true;
  }

  clear(): void {
    for (let i = 0; i < this.dense.length; i++) {
      this.sparse[this.dense[i]] = EMPTY;
    }
    this.dense.length = 0;
  }

  /** Copy of the members, safe to hold across mutation. */
  to_array(): number[] {
    return this.dense.slice();
  }

  [Symbol.iterator](): Iterator<number> {
    return this.dense[Symbol.iterator]();
  }
}
