/**
 * Rainflow Engine - Turning Point Storage
 * =======================================
 * Persistence interface for confirmed turning points, plus the in-memory
 * implementation
 */

import { ValueTuple } from '../types';

export interface TurningPointStore {
  /** Store a copy of `tp`, returns its position (base 1) */
  append(tp: ValueTuple): number;
  /** Turning point at position `tpPos` (base 1) */
  get(tpPos: number): ValueTuple | undefined;
  incrementDamage(tpPos: number, damage: number): void;
  /** Drop all stored points, called when the session counts are cleared */
  clear?(): void;
}

export class MemoryTurningPointStore implements TurningPointStore {
  private points: ValueTuple[] = [];

  append(tp: ValueTuple): number {
    const tpPos = this.points.length + 1;
    this.points.push({ ...tp, tpPos });
    return tpPos;
  }

  get(tpPos: number): ValueTuple | undefined {
    const tp = this.points[tpPos - 1];
    return tp ? { ...tp } : undefined;
  }

  incrementDamage(tpPos: number, damage: number): void {
    const tp = this.points[tpPos - 1];
    if (!tp) {
      throw new RangeError(`No turning point at position ${tpPos}`);
    }
    tp.damage += damage;
  }

  get size(): number {
    return this.points.length;
  }

  toArray(): ValueTuple[] {
    return this.points.map((tp) => ({ ...tp }));
  }

  clear(): void {
    this.points = [];
  }
}

export function createMemoryTurningPointStore(): MemoryTurningPointStore {
  return new MemoryTurningPointStore();
}
