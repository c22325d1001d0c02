/**
 * Rainflow Engine - Counting Sinks
 * ================================
 * Rainflow matrix, range pair and level crossing histograms, the damage
 * accumulator, and the recorder that feeds closed cycles into them
 */

import { CountFlags, ValueTuple, FULL_CYCLE, SpreadDamageMethod } from '../types';
import { RainflowConfig } from './rainflow-config';
import { DamageContext, cycleDamage } from './damage';

// ============================================================================
// SINKS
// ============================================================================

export class CountingSinks {
  readonly classCount: number;
  /** Row-major, `matrix[from * classCount + to]` */
  readonly matrix: Float64Array | null;
  readonly rangePair: Float64Array | null;
  readonly levelCrossing: Float64Array | null;
  damage = 0;

  constructor(classCount: number, flags: Readonly<CountFlags>) {
    this.classCount = classCount;
    this.matrix = classCount && flags.matrix ? new Float64Array(classCount * classCount) : null;
    this.rangePair = classCount && flags.rangePair ? new Float64Array(classCount) : null;
    this.levelCrossing =
      classCount && (flags.levelCrossingUp || flags.levelCrossingDown) ? new Float64Array(classCount) : null;
  }

  clear(): void {
    this.matrix?.fill(0);
    this.rangePair?.fill(0);
    this.levelCrossing?.fill(0);
    this.damage = 0;
  }

  matrixIndex(from: number, to: number): number {
    return from * this.classCount + to;
  }
}

// ============================================================================
// RECORDER
// ============================================================================

/** Which sinks a single count reaches */
export interface CountMask {
  matrix: boolean;
  damage: boolean;
  rangePair: boolean;
  levelCrossingUp: boolean;
  levelCrossingDown: boolean;
  damageHistory: boolean;
  enforceMargin: boolean;
}

/** A closed cycle, reported to listeners */
export interface CycleEvent {
  from: ValueTuple;
  to: ValueTuple;
  weight: number;
  damage: number;
}

export type CycleListener = (event: CycleEvent) => void;

export class CycleRecorder {
  private readonly damageCtx: DamageContext;
  private listener: CycleListener | null = null;

  constructor(
    private readonly config: RainflowConfig,
    private readonly sinks: CountingSinks,
  ) {
    this.damageCtx = {
      classes: config.classes,
      model: config.damageModel,
      transform: config.amplitudeTransform,
    };
  }

  getDamageContext(): DamageContext {
    return this.damageCtx;
  }

  onCycle(listener: CycleListener | null): void {
    this.listener = listener;
  }

  /**
   * Count a closed cycle (matrix, range pair, damage, damage spreading).
   * Level crossings are counted per slope, see `countSlope()`.
   */
  countCycle(from: ValueTuple, to: ValueTuple, weight: number): void {
    const flags = this.config.flags;
    this.count(from, to, weight, { ...flags, levelCrossingUp: false, levelCrossingDown: false });
  }

  /**
   * Level crossing count of one confirmed slope
   */
  countSlope(from: ValueTuple, to: ValueTuple): void {
    const flags = this.config.flags;
    const rising = to.value > from.value;
    this.count(from, to, FULL_CYCLE, {
      matrix: false,
      damage: false,
      rangePair: false,
      damageHistory: false,
      levelCrossingUp: rising && flags.levelCrossingUp,
      levelCrossingDown: !rising && flags.levelCrossingDown,
      enforceMargin: flags.enforceMargin,
    });
  }

  /**
   * Count with an explicit mask, a closed cycle counts as one rising and one
   * falling crossing when both level crossing directions are selected.
   */
  count(from: ValueTuple, to: ValueTuple, weight: number, mask: CountMask): void {
    const { classes, hysteresis } = this.config;
    const sinks = this.sinks;

    // With enforced margins cycles within the hysteresis band are possible
    if (mask.enforceMargin && Math.abs(to.value - from.value) <= hysteresis) {
      return;
    }

    const last = classes.count - 1;
    const classFrom = Math.min(from.cls, last);
    const classTo = Math.min(to.cls, last);

    if (classFrom === classTo) return;

    let damage = 0;
    if (mask.damage) {
      damage = (cycleDamage(this.damageCtx, classFrom, classTo).damage * weight) / FULL_CYCLE;
      sinks.damage += damage;
    }

    if (mask.matrix && sinks.matrix) {
      sinks.matrix[sinks.matrixIndex(classFrom, classTo)] += weight;
    }

    if (mask.rangePair && sinks.rangePair) {
      sinks.rangePair[Math.abs(classFrom - classTo)] += weight;
    }

    if (sinks.levelCrossing && (mask.levelCrossingUp || mask.levelCrossingDown)) {
      const lo = Math.min(classFrom, classTo);
      const hi = Math.max(classFrom, classTo);
      for (let idx = lo; idx < hi; idx++) {
        if (mask.levelCrossingUp) sinks.levelCrossing[idx] += FULL_CYCLE;
        if (mask.levelCrossingDown) sinks.levelCrossing[idx] += FULL_CYCLE;
      }
    }

    if (mask.damage && mask.damageHistory && damage > 0) {
      this.spreadDamage(from, to, damage);
    }

    if (mask.damage || mask.matrix || mask.rangePair) {
      this.listener?.({ from, to, weight, damage });
    }
  }

  /**
   * Assign the damage of a cycle to its turning points and to the damage history
   */
  private spreadDamage(from: ValueTuple, to: ValueTuple, damage: number): void {
    const store = this.config.turningPointStore;
    const history = this.config.damageHistory;
    let method: SpreadDamageMethod = this.config.spreadDamage;

    if (method === 'none' || (!store && !history)) return;

    if (store) {
      if (!from.tpPos && !to.tpPos) return;
      if (!from.tpPos) method = 'full_p3';
      if (!to.tpPos) method = 'full_p2';
    }

    let lhs = damage / 2;
    let rhs = damage / 2;
    if (method === 'full_p2') {
      lhs = damage;
      rhs = 0;
    } else if (method === 'full_p3') {
      lhs = 0;
      rhs = damage;
    }

    if (store) {
      if (from.tpPos && lhs) store.incrementDamage(from.tpPos, lhs);
      if (to.tpPos && rhs) store.incrementDamage(to.tpPos, rhs);
    }

    if (history) {
      if (from.pos) {
        if (lhs) history.add(from.pos, lhs);
      } else {
        rhs += lhs;
      }
      if (to.pos && rhs) history.add(to.pos, rhs);
    }
  }
}
