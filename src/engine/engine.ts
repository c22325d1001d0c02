/**
 * Rainflow Engine - Counting Engine
 * =================================
 * Mutable per-session state: filter, residue, cycle strategy and sinks.
 * Owned by a RainflowSession, which adds the state machine and error policy.
 */

import { ValueTuple, FULL_CYCLE } from '../types';
import { RainflowError, InvariantViolation } from '../core/errors';
import { RainflowConfig } from './rainflow-config';
import { quantize, isInRange } from './classes';
import { TurningPointFilter, MarginTracker, createTuple } from './turning-points';
import { Residue } from './residue';
import { CycleStrategy, createCycleStrategy } from './counting';
import { CountingSinks, CycleRecorder } from './counts';

export class CountingEngine {
  readonly filter: TurningPointFilter;
  readonly margin = new MarginTracker();
  readonly residue: Residue;
  readonly strategy: CycleStrategy;
  readonly sinks: CountingSinks;
  readonly recorder: CycleRecorder;

  private pos = 0;
  private finalized = false;
  private tpLocked = false;
  private refeeding = false;
  private lastTurningPoint: ValueTuple | null = null;

  constructor(readonly config: RainflowConfig) {
    this.filter = new TurningPointFilter(config.hysteresis);
    this.residue = new Residue(config.residueCapacity);
    this.strategy = createCycleStrategy(config.countingMethod, config.residueCapacity, config.classes.width);
    this.sinks = new CountingSinks(config.classes.count, config.flags);
    this.recorder = new CycleRecorder(config, this.sinks);
  }

  getPosition(): number {
    return this.pos;
  }

  isFinalized(): boolean {
    return this.finalized;
  }

  markFinalized(): void {
    this.finalized = true;
  }

  // ==========================================================================
  // FEEDING
  // ==========================================================================

  /**
   * Classify a raw value and assign the next stream position
   */
  makeSample(value: number): ValueTuple {
    if (!Number.isFinite(value)) {
      throw new RainflowError('invalid_argument', `Sample ${this.pos + 1} is not finite: ${value}`);
    }

    const classes = this.config.classes;
    if (!isInRange(classes, value)) {
      throw new RainflowError('data_out_of_range', `Sample ${this.pos + 1} out of class range: ${value}`, null, {
        value,
        pos: this.pos + 1,
      });
    }

    return createTuple(value, quantize(classes, value), ++this.pos);
  }

  /**
   * Validate a caller supplied tuple (class and position kept)
   */
  checkTuple(tp: ValueTuple): ValueTuple {
    const classes = this.config.classes;
    if (!Number.isFinite(tp.value)) {
      throw new RainflowError('invalid_argument', `Tuple value is not finite: ${tp.value}`);
    }
    if (classes.count && (tp.cls >= classes.count || tp.value < classes.offset)) {
      throw new RainflowError('data_out_of_range', `Tuple out of class range: ${tp.value}`, null, { cls: tp.cls });
    }
    return { ...tp };
  }

  /**
   * Process one sample: filter, margin, turning point storage, level
   * crossing and cycle closing
   */
  feedOnce(pt: ValueTuple): void {
    const tp = this.filter.push(pt);
    let process = tp !== null;

    if (this.config.flags.enforceMargin && !this.tpLocked) {
      const margin = this.margin.observe(pt, tp);
      if (margin === 'left') {
        const left = { ...pt };
        this.storeTurningPoint(left);
      } else if (margin === 'duplicate' && tp) {
        // First turning point is the left margin itself
        tp.tpPos = this.config.turningPointStore ? 1 : 0;
        process = false;
      }
    }

    if (!tp) return;

    if (!this.residue.push(tp)) {
      throw new InvariantViolation(`Residue overflow (capacity ${this.residue.getCapacity()})`);
    }

    if (!process) {
      this.lastTurningPoint = tp;
      return;
    }

    this.storeTurningPoint(tp);
    this.countSlope(tp);

    if (this.config.classes.count) {
      this.findCycles();
    } else if (this.residue.length > 1) {
      this.residue.remove(0, 1);
    }
  }

  /**
   * Feed residue points a second time. Their slopes are already in the
   * level crossing histogram, so level crossings are not counted.
   */
  refeed(tuples: readonly ValueTuple[]): void {
    this.refeeding = true;
    try {
      for (const tuple of tuples) {
        this.feedOnce(this.checkTuple(tuple));
      }
    } finally {
      this.refeeding = false;
    }
  }

  /**
   * Promote the interim point, store margins, close remaining cycles and
   * collect points held by the strategy. Runs once.
   */
  feedFinalize(): void {
    if (this.finalized) return;

    const interim = this.filter.takeInterim();
    if (interim && !this.residue.push(interim)) {
      throw new InvariantViolation('Residue overflow on interim turning point');
    }

    this.finalizeTurningPoints(interim);

    if (interim) {
      this.countSlope(interim);
      this.findCycles();
    }

    this.strategy.finalize(this.residue);
    this.finalized = true;
  }

  /** Run the strategy on the residue, prune when no cycles are counted */
  findCycles(): void {
    this.strategy.findCycles(this.residue, (from, to, weight) => this.recorder.countCycle(from, to, weight));

    if (this.config.countingMethod === 'none' || !this.config.classes.count) {
      if (this.residue.length > 1) {
        this.residue.remove(0, this.residue.length - 1);
      }
    }
  }

  /** Closed cycle between two raw values, counted on every enabled sink */
  processCycle(fromValue: number, toValue: number): void {
    const classes = this.config.classes;
    const clamp = (value: number): number => Math.max(0, quantize(classes, value));
    const from = createTuple(fromValue, clamp(fromValue), 0);
    const to = createTuple(toValue, clamp(toValue), 0);
    this.recorder.count(from, to, FULL_CYCLE, this.config.flags);
  }

  // ==========================================================================
  // TURNING POINT STORAGE
  // ==========================================================================

  private storeTurningPoint(tp: ValueTuple): void {
    const store = this.config.turningPointStore;
    if (!store || this.tpLocked || tp.tpPos) return;
    tp.tpPos = store.append(tp);
  }

  private finalizeTurningPoints(interim: ValueTuple | null): void {
    if (this.config.flags.enforceMargin && !this.tpLocked) {
      const right = this.margin.getRight();

      if (interim) {
        if (right && this.margin.hasStarted() && interim.value === right.value) {
          const stored = { ...right };
          this.storeTurningPoint(stored);
          interim.tpPos = stored.tpPos;
        } else {
          this.storeTurningPoint(interim);
          if (right) this.storeTurningPoint({ ...right });
        }
      } else if (right) {
        this.storeTurningPoint({ ...right });
      }
    } else if (interim) {
      this.storeTurningPoint(interim);
    }

    this.tpLocked = true;
  }

  // ==========================================================================
  // LEVEL CROSSING
  // ==========================================================================

  private countSlope(tp: ValueTuple): void {
    const previous = this.lastTurningPoint;
    this.lastTurningPoint = tp;
    if (previous && this.config.classes.count && !this.refeeding) {
      this.recorder.countSlope(previous, tp);
    }
  }
}
