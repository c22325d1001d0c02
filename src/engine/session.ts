/**
 * Rainflow Engine - Counting Session
 * ==================================
 * State machine around one counting engine. Mutating operations return
 * false on failure, the first error is recorded and sticks until deinit().
 */

import {
  CountingState,
  RainflowErrorCode,
  ResidualMethod,
  ValueTuple,
  MatrixItem,
  RpDamageMethod,
  ClassParams,
  STATE_ORDER,
} from '../types';
import { RainflowError, InvariantViolation, isRainflowError } from '../core/errors';
import { getLogger } from '../utils/logger';
import { RainflowConfig, RainflowOptions, createRainflowConfig } from './rainflow-config';
import { CountingEngine } from './engine';
import { finalizeResidue } from './finalizer';
import { classMean, classUpper, isInRange, quantize } from './classes';
import { CycleListener } from './counts';
import {
  MatrixView,
  MatrixRegion,
  LevelCrossingHistogram,
  RangePairHistogram,
  makeSymmetric,
  countNonZeros,
  matrixItems,
  setMatrixItems,
  cellIndexOf,
  matrixSum,
  matrixDamage,
  isDiagonalZero,
  lcFromMatrix,
  lcFromResidue,
  lcFromResidueValues,
  rpFromMatrix,
  rangePairAmplitudes,
  damageFromRp,
  damageFromMatrix,
} from './histograms';

// ============================================================================
// SESSION
// ============================================================================

export class RainflowSession {
  private state: CountingState = 'init0';
  private errorCode: RainflowErrorCode | null = null;
  private errorMessage: string | null = null;
  private config: RainflowConfig | null = null;
  private engine: CountingEngine | null = null;
  private damageResidue = 0;
  private cycleListener: CycleListener | null = null;

  constructor(options?: RainflowOptions) {
    if (options) {
      this.init(options);
    }
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  /**
   * Validate the options and allocate the engine. Only valid in `init0`.
   */
  init(options: RainflowOptions): boolean {
    if (this.state !== 'init0') {
      getLogger().warn(`init() ignored in state '${this.state}', call deinit() first`);
      return false;
    }

    const result = createRainflowConfig(options);
    if (!result.ok) {
      return this.fail(result.code, result.errors.join('; '));
    }

    try {
      this.engine = new CountingEngine(result.config);
    } catch (error) {
      return this.fail(error instanceof RangeError ? 'memory' : 'unexpected', errorText(error));
    }

    this.config = result.config;
    this.engine.recorder.onCycle(this.cycleListener);
    this.damageResidue = 0;
    this.setState('init');
    return true;
  }

  /** Release the engine and return to `init0`, clears a recorded error */
  deinit(): void {
    this.engine = null;
    this.config = null;
    this.errorCode = null;
    this.errorMessage = null;
    this.damageResidue = 0;
    this.setState('init0');
  }

  /**
   * Reset counts, residue and filter while keeping the configuration
   */
  clearCounts(): boolean {
    const config = this.config;
    if (!config || this.state === 'error') return false;

    return this.guard(() => {
      config.turningPointStore?.clear?.();
      config.damageHistory?.clear?.();
      this.engine = new CountingEngine(config);
      this.engine.recorder.onCycle(this.cycleListener);
      this.damageResidue = 0;
      this.setState('init');
    });
  }

  /** Observe every counted cycle */
  onCycle(listener: CycleListener | null): void {
    this.cycleListener = listener;
    this.engine?.recorder.onCycle(listener);
  }

  // ==========================================================================
  // FEEDING
  // ==========================================================================

  /**
   * Feed raw samples. `count` limits the number taken from `values`.
   */
  feed(values: ArrayLike<number>, count: number = values.length): boolean {
    const engine = this.acceptingEngine();
    if (!engine) return false;

    if (!Number.isInteger(count) || count < 0 || count > values.length) {
      return this.fail('invalid_argument', `Invalid sample count ${count} for ${values.length} value(s)`);
    }

    return this.guard(() => {
      for (let i = 0; i < count; i++) {
        engine.feedOnce(engine.makeSample(values[i]));
        this.syncState(engine);
      }
    });
  }

  /** Feed raw samples multiplied by `factor` */
  feedScaled(values: ArrayLike<number>, factor: number): boolean {
    if (!Number.isFinite(factor)) {
      if (this.state === 'error') return false;
      return this.fail('invalid_argument', `Invalid scale factor ${factor}`);
    }
    return this.feed(Array.from(values, (value) => value * factor));
  }

  /**
   * Feed pre-classified tuples. Positions are taken as given, the sample
   * counter is not advanced.
   */
  feedTuples(tuples: readonly ValueTuple[]): boolean {
    const engine = this.acceptingEngine();
    if (!engine) return false;

    return this.guard(() => {
      for (const tuple of tuples) {
        engine.feedOnce(engine.checkTuple(tuple));
        this.syncState(engine);
      }
    });
  }

  /**
   * Count a closed cycle between two raw values directly, on every enabled sink
   */
  processCycle(fromValue: number, toValue: number): boolean {
    const engine = this.readyEngine();
    if (!engine) return false;

    if (!Number.isFinite(fromValue) || !Number.isFinite(toValue)) {
      return this.fail('invalid_argument', `Cycle values must be finite: ${fromValue} -> ${toValue}`);
    }

    return this.guard(() => engine.processCycle(fromValue, toValue));
  }

  // ==========================================================================
  // FINALIZE
  // ==========================================================================

  /**
   * Dispose of the residue with `method` and finish the session. Runs once.
   */
  finalize(method: ResidualMethod = 'none'): boolean {
    const engine = this.acceptingEngine();
    if (!engine) return false;

    const damageBefore = engine.sinks.damage;
    this.setState('finalize');

    const ok = this.guard(() => {
      finalizeResidue(engine, method);

      if (engine.config.countingMethod === 'none' || !engine.config.classes.count) {
        engine.residue.clear();
      }
    });

    if (!ok) return false;

    this.damageResidue = engine.sinks.damage - damageBefore;
    this.setState('finished');
    getLogger().debug(`Session finalized (${method})`, {
      samples: engine.getPosition(),
      residue: engine.residue.length,
      damage: engine.sinks.damage,
    });
    return true;
  }

  // ==========================================================================
  // STATE QUERIES
  // ==========================================================================

  getState(): CountingState {
    return this.state;
  }

  getError(): RainflowErrorCode | null {
    return this.errorCode;
  }

  getErrorMessage(): string | null {
    return this.errorMessage;
  }

  getConfig(): RainflowConfig | null {
    return this.config;
  }

  /** Number of samples fed so far */
  getPosition(): number {
    return this.engine?.getPosition() ?? 0;
  }

  /** The recorded failure as an exception, null while the session is healthy */
  toError(): RainflowError | null {
    if (!this.errorCode) return null;
    return new RainflowError(this.errorCode, this.errorMessage ?? undefined, this.state);
  }

  // ==========================================================================
  // RESULT QUERIES
  // ==========================================================================

  /** Cumulative damage, including the residue share after finalize */
  getDamage(): number {
    return this.engine?.sinks.damage ?? 0;
  }

  /** Part of the damage added while finalizing */
  getDamageResidue(): number {
    return this.damageResidue;
  }

  /** Rainflow matrix as rows (from) of columns (to), null when disabled */
  getMatrix(): number[][] | null {
    const view = this.matrixView();
    if (!view) return null;

    const n = view.classes.count;
    const rows: number[][] = [];
    for (let from = 0; from < n; from++) {
      rows.push(Array.from(view.counts.subarray(from * n, (from + 1) * n)));
    }
    return rows;
  }

  getRangePair(): RangePairHistogram | null {
    const engine = this.engine;
    if (!engine?.sinks.rangePair) return null;
    return {
      counts: Array.from(engine.sinks.rangePair),
      amplitudes: rangePairAmplitudes(engine.config.classes),
    };
  }

  getLevelCrossing(): LevelCrossingHistogram | null {
    const engine = this.engine;
    if (!engine?.sinks.levelCrossing) return null;
    const classes = engine.config.classes;
    return {
      counts: Array.from(engine.sinks.levelCrossing),
      levels: Array.from({ length: classes.count }, (_, i) => classUpper(classes, i)),
    };
  }

  /**
   * Copy of the residue. With `includeInterim` the pending interim point is
   * appended.
   */
  getResidue(includeInterim = false): ValueTuple[] {
    const engine = this.engine;
    if (!engine) return [];

    const residue = engine.residue.toArray();
    const interim = engine.filter.getInterim();
    if (includeInterim && interim) {
      residue.push({ ...interim });
    }
    return residue;
  }

  // ==========================================================================
  // CLASS HELPERS
  // ==========================================================================

  getClasses(): Readonly<ClassParams> | null {
    return this.config?.classes ?? null;
  }

  getHysteresis(): number | null {
    return this.config?.hysteresis ?? null;
  }

  /** Class index of a value, null when outside the class range */
  classNumber(value: number): number | null {
    const classes = this.config?.classes;
    if (!classes || !isInRange(classes, value)) return null;
    return quantize(classes, value);
  }

  classMean(cls: number): number | null {
    const classes = this.config?.classes;
    return classes && this.isClass(classes, cls) ? classMean(classes, cls) : null;
  }

  classUpper(cls: number): number | null {
    const classes = this.config?.classes;
    return classes && this.isClass(classes, cls) ? classUpper(classes, cls) : null;
  }

  private isClass(classes: Readonly<ClassParams>, cls: number): boolean {
    return Number.isInteger(cls) && cls >= 0 && cls < classes.count;
  }

  // ==========================================================================
  // MATRIX OPERATIONS
  // ==========================================================================

  /** Fold the matrix onto its upper triangle */
  rfmMakeSymmetric(): boolean {
    return this.withMatrix((view) => makeSymmetric(view));
  }

  rfmNonZeros(): number | null {
    const view = this.matrixView();
    return view ? countNonZeros(view) : null;
  }

  rfmGet(): MatrixItem[] | null {
    const view = this.matrixView();
    return view ? matrixItems(view) : null;
  }

  rfmSet(items: readonly MatrixItem[], addOnly = false): boolean {
    return this.withMatrix((view) => setMatrixItems(view, items, addOnly));
  }

  /** Count stored for the cycle between two raw values */
  rfmPeek(fromValue: number, toValue: number): number | null {
    const view = this.matrixView();
    if (!view || !Number.isFinite(fromValue) || !Number.isFinite(toValue)) return null;
    return view.counts[cellIndexOf(view, fromValue, toValue)];
  }

  rfmPoke(fromValue: number, toValue: number, counts: number, addOnly = false): boolean {
    if (![fromValue, toValue, counts].every(Number.isFinite)) {
      if (this.state === 'error') return false;
      return this.fail('invalid_argument', 'Matrix values must be finite');
    }
    return this.withMatrix((view) => {
      const idx = cellIndexOf(view, fromValue, toValue);
      view.counts[idx] = addOnly ? view.counts[idx] + counts : counts;
    });
  }

  /** Sum of a region, bounds inclusive. Throws on an invalid region. */
  rfmSum(region: MatrixRegion): number | null {
    const view = this.matrixView();
    return view ? matrixSum(view, region) : null;
  }

  /** Damage of a region, bounds inclusive. Throws on an invalid region. */
  rfmDamage(region: MatrixRegion): number | null {
    const engine = this.engine;
    const view = this.matrixView();
    return engine && view ? matrixDamage(view, engine.recorder.getDamageContext(), region) : null;
  }

  /** True when the matrix diagonal is all zero */
  rfmCheck(): boolean {
    const view = this.matrixView();
    return view ? isDiagonalZero(view) : false;
  }

  // ==========================================================================
  // DERIVED HISTOGRAMS
  // ==========================================================================

  lcFromRfm(up = true, down = true, rfm?: Float64Array): LevelCrossingHistogram | null {
    const view = this.matrixView(rfm);
    return view ? lcFromMatrix(view, up, down) : null;
  }

  /** Level crossings of the residue slopes; raw values replace the session residue */
  lcFromResidue(up = true, down = true, values?: readonly number[]): LevelCrossingHistogram | null {
    const engine = this.engine;
    if (!engine || !engine.config.classes.count) return null;
    const classes = engine.config.classes;
    return values
      ? lcFromResidueValues(classes, values, up, down)
      : lcFromResidue(classes, engine.residue.view(), up, down);
  }

  rpFromRfm(rfm?: Float64Array): RangePairHistogram | null {
    const view = this.matrixView(rfm);
    return view ? rpFromMatrix(view) : null;
  }

  /**
   * Damage of a range pair histogram, the session histogram when `rp` is
   * omitted. Throws RainflowError on invalid input.
   */
  damageFromRp(method: RpDamageMethod = 'default', rp?: ArrayLike<number>, sa?: ArrayLike<number>): number | null {
    const engine = this.engine;
    const histogram = rp ?? engine?.sinks.rangePair;
    if (!engine || !histogram || !engine.config.classes.count) return null;
    return damageFromRp(engine.recorder.getDamageContext(), engine.config.woehler, histogram, sa ?? null, method);
  }

  damageFromRfm(rfm?: Float64Array): number | null {
    const engine = this.engine;
    const view = this.matrixView(rfm);
    return engine && view ? damageFromMatrix(view, engine.recorder.getDamageContext()) : null;
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  /** Engine when samples may be fed, false/null otherwise */
  private acceptingEngine(): CountingEngine | null {
    if (this.state === 'error') return null;
    const engine = this.engine;
    if (!engine || STATE_ORDER[this.state] >= STATE_ORDER.finalize) {
      getLogger().warn(`Rejected operation in state '${this.state}'`);
      return null;
    }
    return engine;
  }

  /** Engine when results may be read or changed (initialized, not in error) */
  private readyEngine(): CountingEngine | null {
    if (this.state === 'error' || this.state === 'init0') return null;
    return this.engine;
  }

  private matrixView(rfm?: Float64Array): MatrixView | null {
    const engine = this.readyEngine();
    if (!engine) return null;

    const classes = engine.config.classes;
    const counts = rfm ?? engine.sinks.matrix;
    if (!counts || !classes.count || counts.length !== classes.count * classes.count) return null;
    return { classes, counts };
  }

  private withMatrix(action: (view: MatrixView) => void): boolean {
    const engine = this.readyEngine();
    if (!engine) return false;

    const view = this.matrixView();
    if (!view) {
      return this.fail('unsupported', 'Rainflow matrix is not enabled for this session');
    }
    return this.guard(() => action(view));
  }

  private syncState(engine: CountingEngine): void {
    const stage = engine.filter.getStage();
    if (stage !== 'init' && stage !== this.state) {
      this.setState(stage);
    }
  }

  private setState(state: CountingState): void {
    if (state !== this.state) {
      getLogger().debug(`Session state ${this.state} -> ${state}`);
      this.state = state;
    }
  }

  /** Run `action`, map a thrown error onto the error taxonomy */
  private guard(action: () => void): boolean {
    try {
      action();
      return true;
    } catch (error) {
      return this.fail(classifyError(error), errorText(error));
    }
  }

  private fail(code: RainflowErrorCode, message: string): false {
    if (this.state !== 'error') {
      this.errorCode = code;
      this.errorMessage = message;
      getLogger().warn(`Session error [${code}] in state '${this.state}': ${message}`);
      this.state = 'error';
    }
    return false;
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function classifyError(error: unknown): RainflowErrorCode {
  if (isRainflowError(error)) return error.code;
  if (error instanceof InvariantViolation || error instanceof RangeError) return 'data_inconsistent';
  return 'unexpected';
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createRainflowSession(options?: RainflowOptions): RainflowSession {
  return new RainflowSession(options);
}
