/**
 * Rainflow Engine - Turning Point Filter
 * ======================================
 * Hysteresis and peak/valley filtering of a sample stream
 */

import { ValueTuple } from '../types';

// ============================================================================
// TYPES
// ============================================================================

/** Progress of the filter: no sample yet, searching first pair, tracking an interim point */
export type FilterStage = 'init' | 'busy' | 'busy_interim';

/** Slope direction, 0 before the first turning point */
export type Slope = -1 | 0 | 1;

export function createTuple(value: number, cls: number, pos: number): ValueTuple {
  return { value, cls, pos, tpPos: 0, damage: 0 };
}

// ============================================================================
// FILTER
// ============================================================================

export class TurningPointFilter {
  private stage: FilterStage = 'init';
  private slope: Slope = 0;
  private minimum: ValueTuple | null = null;
  private maximum: ValueTuple | null = null;
  private interimPoint: ValueTuple | null = null;

  constructor(private readonly hysteresis: number) {}

  getStage(): FilterStage {
    return this.stage;
  }

  getSlope(): Slope {
    return this.slope;
  }

  /** The trailing candidate, not yet confirmed as turning point */
  getInterim(): ValueTuple | null {
    return this.interimPoint;
  }

  /**
   * Process one sample. Returns the newly confirmed turning point or null.
   * At most one turning point is confirmed per sample.
   */
  push(pt: ValueTuple): ValueTuple | null {
    if (this.stage === 'busy_interim' && this.interimPoint) {
      return this.track(this.interimPoint, pt);
    }

    if (this.stage === 'init' || !this.minimum || !this.maximum) {
      this.minimum = { ...pt };
      this.maximum = { ...pt };
      this.stage = 'busy';
      return null;
    }

    // Still searching the first turning point
    let falling: boolean | null = null;
    if (pt.value < this.minimum.value) {
      falling = true;
      this.minimum = { ...pt };
    } else if (pt.value > this.maximum.value) {
      falling = false;
      this.maximum = { ...pt };
    }

    if (falling === null || this.maximum.value - this.minimum.value <= this.hysteresis) {
      return null;
    }

    // Earlier extreme first, the current sample becomes the interim point
    const first = falling ? this.maximum : this.minimum;
    this.slope = falling ? -1 : 1;
    this.stage = 'busy_interim';
    this.interimPoint = { ...pt };
    this.minimum = null;
    this.maximum = null;
    return { ...first };
  }

  private track(interim: ValueTuple, pt: ValueTuple): ValueTuple | null {
    const delta = pt.value - interim.value;
    const sign: Slope = delta < 0 ? -1 : 1;

    if (sign === this.slope) {
      // Slope continues, move the interim point
      if (interim.value !== pt.value) {
        this.interimPoint = { ...pt };
      }
      return null;
    }

    if (Math.abs(delta) > this.hysteresis) {
      this.slope = sign;
      this.interimPoint = { ...pt };
      return interim;
    }

    // Reversal within the hysteresis band
    return null;
  }

  /**
   * Remove and return the interim point, so it can be counted as the last
   * turning point at the end of the stream.
   */
  takeInterim(): ValueTuple | null {
    const interim = this.interimPoint;
    if (this.stage === 'busy_interim') {
      this.stage = 'busy';
    }
    this.interimPoint = null;
    return interim;
  }

  reset(): void {
    this.stage = 'init';
    this.slope = 0;
    this.minimum = null;
    this.maximum = null;
    this.interimPoint = null;
  }
}

// ============================================================================
// MARGIN TRACKING
// ============================================================================

/**
 * Remembers the first and last sample of the stream, so they can be kept as
 * turning points in turning point storage.
 */
export class MarginTracker {
  private stage: 0 | 1 | 2 = 0;
  private left: ValueTuple | null = null;
  private right: ValueTuple | null = null;

  getLeft(): ValueTuple | null {
    return this.left;
  }

  getRight(): ValueTuple | null {
    return this.right;
  }

  hasStarted(): boolean {
    return this.stage > 0;
  }

  /**
   * Observe a sample and the turning point it confirmed (if any).
   * Returns `'left'` for the very first sample, `'duplicate'` when the first
   * turning point is the left margin itself, otherwise `'none'`.
   */
  observe(pt: ValueTuple, confirmed: ValueTuple | null): 'left' | 'duplicate' | 'none' {
    switch (this.stage) {
      case 0:
        this.left = { ...pt };
        this.stage = 1;
        return 'left';
      case 1:
        this.right = { ...pt };
        if (confirmed) {
          this.stage = 2;
          if (this.left && confirmed.value === this.left.value) {
            return 'duplicate';
          }
        }
        return 'none';
      default:
        this.right = { ...pt };
        return 'none';
    }
  }

  reset(): void {
    this.stage = 0;
    this.left = null;
    this.right = null;
  }
}

// ============================================================================
// LAZY SEQUENCE
// ============================================================================

/**
 * Lazily yields the turning points of a finite value sequence. The last
 * candidate is yielded at the end of the input unless `includeLast` is false.
 * Positions are base 1.
 */
export function* turningPoints(
  values: Iterable<number>,
  hysteresis = 0,
  includeLast = true,
): Generator<{ value: number; pos: number }, void, undefined> {
  const filter = new TurningPointFilter(hysteresis);
  let pos = 0;

  for (const value of values) {
    pos++;
    const tp = filter.push(createTuple(value, 0, pos));
    if (tp) {
      yield { value: tp.value, pos: tp.pos };
    }
  }

  if (includeLast) {
    const interim = filter.takeInterim();
    if (interim) {
      yield { value: interim.value, pos: interim.pos };
    }
  }
}
