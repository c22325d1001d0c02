/**
 * Rainflow Engine - Session Configuration
 * =======================================
 * Immutable settings of one counting session, validated once at init
 */

import {
  ClassParams,
  CountFlags,
  CountingMethod,
  SpreadDamageMethod,
  WoehlerParams,
  DEFAULT_COUNT_FLAGS,
  RainflowErrorCode,
} from '../types';
import { ClassOptionsZ, WoehlerZ, formatIssues } from '../core/schemas';
import { DamageModel, WoehlerCurve, defaultWoehler, woehlerAny } from './woehler';
import { AmplitudeTransform, DamageHistorySink } from './damage';
import { TurningPointStore } from './tp-store';

// ============================================================================
// TYPES
// ============================================================================

export interface RainflowOptions {
  /** Number of classes, 0 = pass-through mode (turning points only) */
  classCount: number;
  classWidth?: number;
  classOffset?: number;
  hysteresis?: number;
  flags?: Partial<CountFlags>;
  countingMethod?: CountingMethod;
  spreadDamage?: SpreadDamageMethod;
  woehler?: WoehlerParams;
  /** Replaces the Woehler curve for damage evaluation */
  damageModel?: DamageModel;
  turningPointStore?: TurningPointStore;
  damageHistory?: DamageHistorySink;
  amplitudeTransform?: AmplitudeTransform;
}

export interface RainflowConfig {
  readonly classes: Readonly<ClassParams>;
  readonly hysteresis: number;
  readonly flags: Readonly<CountFlags>;
  readonly countingMethod: CountingMethod;
  readonly spreadDamage: SpreadDamageMethod;
  readonly woehler: Readonly<WoehlerParams>;
  readonly damageModel: DamageModel;
  readonly turningPointStore: TurningPointStore | null;
  readonly damageHistory: DamageHistorySink | null;
  readonly amplitudeTransform: AmplitudeTransform | null;
  readonly residueCapacity: number;
}

export type ConfigResult =
  | { ok: true; config: RainflowConfig }
  | { ok: false; code: RainflowErrorCode; errors: string[] };

// ============================================================================
// FACTORY
// ============================================================================

export function createRainflowConfig(options: RainflowOptions): ConfigResult {
  const classCount = options.classCount;
  const parsed = ClassOptionsZ.safeParse({
    classCount,
    classWidth: options.classWidth ?? 1,
    classOffset: options.classOffset ?? 0,
    hysteresis: options.hysteresis ?? 0,
  });

  if (!parsed.success) {
    return { ok: false, code: 'invalid_argument', errors: formatIssues(parsed.error) };
  }

  let woehler = defaultWoehler();
  if (options.woehler) {
    const wl = WoehlerZ.safeParse(options.woehler);
    if (!wl.success) {
      return { ok: false, code: 'invalid_argument', errors: formatIssues(wl.error) };
    }
    woehler = woehlerAny(wl.data);
  }

  const classes: ClassParams = classCount
    ? { count: classCount, width: parsed.data.classWidth, offset: parsed.data.classOffset }
    : { count: 0, width: 1, offset: 0 };

  const config: RainflowConfig = {
    classes: Object.freeze(classes),
    hysteresis: parsed.data.hysteresis,
    flags: Object.freeze({ ...DEFAULT_COUNT_FLAGS, ...options.flags }),
    countingMethod: options.countingMethod ?? '4ptm',
    spreadDamage: options.spreadDamage ?? 'half_23',
    woehler: Object.freeze(woehler),
    damageModel: options.damageModel ?? new WoehlerCurve(woehler),
    turningPointStore: options.turningPointStore ?? null,
    damageHistory: options.damageHistory ?? null,
    amplitudeTransform: options.amplitudeTransform ?? null,
    residueCapacity: Math.max(2 * classCount + 1, 3),
  };

  return { ok: true, config: Object.freeze(config) };
}
