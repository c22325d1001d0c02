/**
 * Rainflow Engine - Cycle Damage
 * ==============================
 * Pseudo damage of a class transition, with the optional mean stress
 * transformation hook
 */

import { ClassParams } from '../types';
import { DamageModel } from './woehler';

/** Mean stress correction: maps amplitude and mean onto an equivalent amplitude */
export type AmplitudeTransform = (sa: number, sm: number) => number;

/** Receives damage increments per stream position (base 1) */
export interface DamageHistorySink {
  add(pos: number, damage: number): void;
  clear?(): void;
}

export interface DamageContext {
  classes: ClassParams;
  model: DamageModel;
  transform: AmplitudeTransform | null;
}

export interface CycleDamage {
  damage: number;
  /** Amplitude used for evaluation, -1 when undefined */
  sa: number;
}

/**
 * Damage of one full cycle between two classes (base 0)
 */
export function cycleDamage(ctx: DamageContext, classFrom: number, classTo: number): CycleDamage {
  if (classFrom === classTo) {
    return { damage: 0, sa: -1 };
  }

  const { width, offset } = ctx.classes;
  const saRaw = (Math.abs(classFrom - classTo) / 2) * width;
  const sm = ((classFrom + classTo) / 2) * width + offset;
  const sa = ctx.transform ? ctx.transform(saRaw, sm) : saRaw;

  if (!Number.isFinite(sa) || sa < 0) {
    throw new RangeError(`Amplitude transform returned ${sa} for Sa=${saRaw}, Sm=${sm}`);
  }

  return { damage: ctx.model.amplitudeDamage(sa), sa };
}

/**
 * Damage history kept in memory, one entry per stream position
 */
export class MemoryDamageHistory implements DamageHistorySink {
  private values: number[] = [];

  add(pos: number, damage: number): void {
    if (!Number.isInteger(pos) || pos < 1) {
      throw new RangeError(`Invalid stream position ${pos}`);
    }
    while (this.values.length < pos) {
      this.values.push(0);
    }
    this.values[pos - 1] += damage;
  }

  /** Damage at stream position `pos` (base 1) */
  at(pos: number): number {
    return this.values[pos - 1] ?? 0;
  }

  toArray(): number[] {
    return this.values.slice();
  }

  clear(): void {
    this.values = [];
  }
}
