/**
 * Rainflow Engine - Residue
 * =========================
 * Ordered sequence of unclosed turning points
 */

import { ValueTuple } from '../types';

export class Residue {
  private items: ValueTuple[] = [];

  constructor(private readonly capacity: number) {}

  get length(): number {
    return this.items.length;
  }

  getCapacity(): number {
    return this.capacity;
  }

  /** Append a confirmed turning point. Returns false when the residue is full. */
  push(tp: ValueTuple): boolean {
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(tp);
    return true;
  }

  /** Item at `index`, negative indices count from the end */
  at(index: number): ValueTuple {
    const i = index < 0 ? this.items.length + index : index;
    const item = this.items[i];
    if (!item) {
      throw new RangeError(`Residue index ${index} out of bounds (length ${this.items.length})`);
    }
    return item;
  }

  /**
   * Remove `count` items starting at `index`, following items move down.
   * Cost is O(removed + trailing items).
   */
  remove(index: number, count: number): void {
    if (index < 0 || index + count > this.items.length) {
      throw new RangeError(`Cannot remove ${count} item(s) at ${index} (length ${this.items.length})`);
    }
    this.items.splice(index, count);
  }

  /** Replace all items, used when a strategy hands back its own stack */
  replace(items: ValueTuple[]): void {
    this.items = items.slice();
  }

  clear(): void {
    this.items = [];
  }

  toArray(): ValueTuple[] {
    return this.items.map((item) => ({ ...item }));
  }

  /** Live view, callers must not mutate it */
  view(): readonly ValueTuple[] {
    return this.items;
  }
}
