/**
 * Rainflow Engine - Matrix & Histogram Utilities
 * ==============================================
 * Operations on a rainflow matrix and the histograms derived from it
 */

import { ClassParams, MatrixItem, RpDamageMethod, ValueTuple, WoehlerParams, FULL_CYCLE } from '../types';
import { RainflowError } from '../core/errors';
import { classUpper, quantizeClamped, rangeAmplitude } from './classes';
import { DamageContext, cycleDamage } from './damage';
import { DamageModel, WoehlerCurve } from './woehler';

// ============================================================================
// TYPES
// ============================================================================

/** Row-major square matrix, `counts[from * classes.count + to]` */
export interface MatrixView {
  classes: Readonly<ClassParams>;
  counts: Float64Array;
}

export interface LevelCrossingHistogram {
  counts: number[];
  /** Upper class bound crossed, per entry */
  levels: number[];
}

export interface RangePairHistogram {
  /** Counts per range in classes (index 0 = range 0) */
  counts: number[];
  amplitudes: number[];
}

export interface MatrixRegion {
  fromFirst: number;
  fromLast: number;
  toFirst: number;
  toLast: number;
}

// ============================================================================
// MATRIX
// ============================================================================

function cell(m: MatrixView, from: number, to: number): number {
  return m.counts[from * m.classes.count + to];
}

/**
 * Fold the lower triangle onto the upper one, so `from < to` holds for every
 * non-zero entry
 */
export function makeSymmetric(m: MatrixView): void {
  const n = m.classes.count;
  for (let from = 0; from < n; from++) {
    for (let to = from + 1; to < n; to++) {
      m.counts[from * n + to] += m.counts[to * n + from];
      m.counts[to * n + from] = 0;
    }
  }
}

export function countNonZeros(m: MatrixView): number {
  let count = 0;
  for (const value of m.counts) {
    if (value) count++;
  }
  return count;
}

/** Sparse listing in row-major order */
export function matrixItems(m: MatrixView): MatrixItem[] {
  const n = m.classes.count;
  const items: MatrixItem[] = [];
  for (let from = 0; from < n; from++) {
    for (let to = 0; to < n; to++) {
      const counts = cell(m, from, to);
      if (counts) items.push({ from, to, counts });
    }
  }
  return items;
}

/**
 * Write sparse items into the matrix. Classes below 0 go to the first class,
 * above the range to the last one. Without `addOnly` the matrix is cleared first.
 */
export function setMatrixItems(m: MatrixView, items: readonly MatrixItem[], addOnly: boolean): void {
  const n = m.classes.count;
  if (!addOnly) m.counts.fill(0);

  const clamp = (cls: number): number => Math.min(Math.max(0, Math.trunc(cls)), n - 1);
  for (const item of items) {
    m.counts[clamp(item.from) * n + clamp(item.to)] += item.counts;
  }
}

/** Matrix index of the cell holding a cycle between two raw values */
export function cellIndexOf(m: MatrixView, fromValue: number, toValue: number): number {
  const from = quantizeClamped(m.classes, fromValue);
  const to = quantizeClamped(m.classes, toValue);
  return from * m.classes.count + to;
}

function checkRegion(m: MatrixView, region: MatrixRegion): void {
  const n = m.classes.count;
  const { fromFirst, fromLast, toFirst, toLast } = region;
  const valid =
    [fromFirst, fromLast, toFirst, toLast].every((c) => Number.isInteger(c) && c >= 0 && c < n) &&
    fromFirst <= fromLast &&
    toFirst <= toLast;

  if (!valid) {
    throw new RainflowError('invalid_argument', `Invalid matrix region ${JSON.stringify(region)}`, null, { ...region });
  }
}

/** Sum of a region, both bounds inclusive */
export function matrixSum(m: MatrixView, region: MatrixRegion): number {
  checkRegion(m, region);
  let sum = 0;
  for (let from = region.fromFirst; from <= region.fromLast; from++) {
    for (let to = region.toFirst; to <= region.toLast; to++) {
      sum += cell(m, from, to);
    }
  }
  return sum;
}

/** Damage of the cycles held in a region, both bounds inclusive */
export function matrixDamage(m: MatrixView, ctx: DamageContext, region: MatrixRegion): number {
  checkRegion(m, region);
  let sum = 0;
  for (let from = region.fromFirst; from <= region.fromLast; from++) {
    for (let to = region.toFirst; to <= region.toLast; to++) {
      const counts = cell(m, from, to);
      if (counts) sum += cycleDamage(ctx, from, to).damage * counts;
    }
  }
  return sum / FULL_CYCLE;
}

/** The diagonal of a consistent matrix is all zero */
export function isDiagonalZero(m: MatrixView): boolean {
  for (let i = 0; i < m.classes.count; i++) {
    if (cell(m, i, i) !== 0) return false;
  }
  return true;
}

// ============================================================================
// LEVEL CROSSING
// ============================================================================

function levels(classes: Readonly<ClassParams>): number[] {
  return Array.from({ length: classes.count }, (_, i) => classUpper(classes, i));
}

/**
 * Level crossings of the closed cycles in a matrix. Every closed cycle has
 * one rising and one falling slope.
 */
export function lcFromMatrix(m: MatrixView, up: boolean, down: boolean): LevelCrossingHistogram {
  const n = m.classes.count;
  const counts = new Array<number>(n).fill(0);

  for (let i = 0; i < n; i++) {
    let sum = 0;
    for (let from = 0; from <= i; from++) {
      for (let to = i + 1; to < n; to++) {
        const cycles = cell(m, from, to) + cell(m, to, from);
        if (up) sum += cycles;
        if (down) sum += cycles;
      }
    }
    counts[i] = sum;
  }

  return { counts, levels: levels(m.classes) };
}

/** Level crossings of the slopes between consecutive residue points */
export function lcFromResidue(
  classes: Readonly<ClassParams>,
  residue: readonly Pick<ValueTuple, 'cls'>[],
  up: boolean,
  down: boolean,
): LevelCrossingHistogram {
  const counts = new Array<number>(classes.count).fill(0);

  for (let i = 1; i < residue.length; i++) {
    const from = residue[i - 1].cls;
    const to = residue[i].cls;

    if (from < to && up) {
      for (let idx = from; idx < to; idx++) counts[idx] += FULL_CYCLE;
    } else if (to < from && down) {
      for (let idx = to; idx < from; idx++) counts[idx] += FULL_CYCLE;
    }
  }

  return { counts, levels: levels(classes) };
}

/** Residue given as raw values, classified with the session classes */
export function lcFromResidueValues(
  classes: Readonly<ClassParams>,
  values: readonly number[],
  up: boolean,
  down: boolean,
): LevelCrossingHistogram {
  return lcFromResidue(
    classes,
    values.map((value) => ({ cls: quantizeClamped(classes, value) })),
    up,
    down,
  );
}

// ============================================================================
// RANGE PAIR
// ============================================================================

export function rangePairAmplitudes(classes: Readonly<ClassParams>): number[] {
  return Array.from({ length: classes.count }, (_, i) => rangeAmplitude(classes, i));
}

/** Range pair histogram of a matrix, rising and falling cycles summed */
export function rpFromMatrix(m: MatrixView): RangePairHistogram {
  const n = m.classes.count;
  const counts = new Array<number>(n).fill(0);

  for (let i = 0; i < n; i++) {
    let sum = 0;
    for (let j = i; j < n; j++) {
      sum += cell(m, j - i, j);
      // Range 0 is the diagonal, count it once
      if (i) sum += cell(m, j, j - i);
    }
    counts[i] = sum;
  }

  return { counts, amplitudes: rangePairAmplitudes(m.classes) };
}

// ============================================================================
// DAMAGE
// ============================================================================

/** Damage of all cycles in a matrix */
export function damageFromMatrix(m: MatrixView, ctx: DamageContext): number {
  const n = m.classes.count;
  if (!n) return 0;
  return matrixDamage(m, ctx, { fromFirst: 0, fromLast: n - 1, toFirst: 0, toLast: n - 1 });
}

/**
 * Damage of a range pair histogram.
 *
 * `default` evaluates the session damage model, `elementary` and `modified`
 * the session Woehler curve without fatigue strength (`elementary` also with
 * k2 = k), `consequent` applies Miner consequent with the curve's `q`.
 * Without `sa` the amplitudes follow from the class width.
 */
export function damageFromRp(
  ctx: DamageContext,
  woehler: Readonly<WoehlerParams>,
  rp: ArrayLike<number>,
  sa: ArrayLike<number> | null,
  method: RpDamageMethod,
): number {
  const n = ctx.classes.count;

  if (rp.length < n || (sa && sa.length < n)) {
    throw new RainflowError('invalid_argument', `Range pair histogram needs ${n} entries`);
  }

  if (sa) {
    for (let i = 1; i < n; i++) {
      if (sa[i] < sa[i - 1]) {
        throw new RainflowError('invalid_argument', 'Amplitudes must be sorted in ascending order', null, { index: i });
      }
    }
  }

  switch (method) {
    case 'default':
      return rpDamage(ctx, rp, sa);
    case 'elementary': {
      const curve = new WoehlerCurve({ ...woehler, k2: woehler.k, q2: woehler.q }).withoutFatigueStrength();
      return rpDamage({ ...ctx, model: curve }, rp, sa);
    }
    case 'modified':
      return rpDamage({ ...ctx, model: new WoehlerCurve(woehler).withoutFatigueStrength() }, rp, sa);
    case 'consequent':
      return rpDamageConsequent(ctx, woehler, rp, sa);
  }
}

function rpDamage(ctx: DamageContext, rp: ArrayLike<number>, sa: ArrayLike<number> | null): number {
  let damage = 0;
  for (let i = 0; i < ctx.classes.count; i++) {
    if (!rp[i]) continue;
    const d = sa ? ctx.model.amplitudeDamage(sa[i]) : cycleDamage(ctx, 0, i).damage;
    damage += d * rp[i];
  }
  return damage / FULL_CYCLE;
}

/**
 * Miner consequent: the fatigue strength degrades with accumulated damage.
 * Partial histograms above each amplitude step are weighted by the
 * depression of the fatigue strength, `(Sj/Sd)^q - (Sa_j/Sd)^q`.
 */
function rpDamageConsequent(
  ctx: DamageContext,
  woehler: Readonly<WoehlerParams>,
  rp: ArrayLike<number>,
  sa: ArrayLike<number> | null,
): number {
  if (woehler.omission > 0) {
    throw new RainflowError('invalid_argument', 'Miner consequent does not allow an omission threshold');
  }
  if (!(woehler.sd > 0)) {
    throw new RainflowError('invalid_argument', 'Miner consequent needs a fatigue strength sd > 0');
  }

  const n = ctx.classes.count;
  const sd = woehler.sd;
  const q = woehler.q;
  const model: DamageModel = new WoehlerCurve(woehler).withoutFatigueStrength();
  const amplitude = (i: number): number => (sa ? sa[i] : rangeAmplitude(ctx.classes, i));

  let sj = sd;
  let inverse = 0;

  for (let j = n - 1; j >= -1; j--) {
    const saJ = j >= 0 ? amplitude(j) : 0;

    // Amplitudes above the unimpaired fatigue strength
    if (saJ >= sd) continue;

    const weight = Math.pow(sj / sd, q) - Math.pow(saJ / sd, q);
    sj = saJ;
    if (weight <= 0) continue;

    let partial = 0;
    for (let i = n - 1; i > j; i--) {
      partial += model.amplitudeDamage(amplitude(i)) * rp[i];
    }

    if (partial > 0) {
      inverse += weight / partial;
    }
  }

  return inverse > 0 ? 1 / inverse / FULL_CYCLE : 0;
}
