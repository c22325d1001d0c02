/**
 * Rainflow Engine - Type Definitions
 * ==================================
 * Core types shared by the counting engine, the session service and the
 * outer surfaces (CLI, web server)
 */

// ============================================================================
// STATE & ERROR TYPES
// ============================================================================

/** Counting session lifecycle */
export type CountingState =
  | 'init0'
  | 'init'
  | 'busy'
  | 'busy_interim'
  | 'finalize'
  | 'finished'
  | 'error';

/** Error taxonomy, one code is recorded when a session fails */
export type RainflowErrorCode =
  | 'invalid_argument'
  | 'unsupported'
  | 'memory'
  | 'data_out_of_range'
  | 'data_inconsistent'
  | 'unexpected';

/** Ordinal of each state, used for range checks like `state < finished` */
export const STATE_ORDER: Record<CountingState, number> = {
  init0: 0,
  init: 1,
  busy: 2,
  busy_interim: 3,
  finalize: 4,
  finished: 5,
  error: 6,
};

// ============================================================================
// METHOD SELECTORS
// ============================================================================

/** Cycle-closing strategy */
export type CountingMethod = 'none' | '4ptm' | 'hcm' | 'astm';

export const COUNTING_METHODS: readonly CountingMethod[] = ['none', '4ptm', 'hcm', 'astm'];

/** Residue disposal policy applied at end of stream */
export type ResidualMethod =
  | 'none'
  | 'ignore'
  | 'no_finalize'
  | 'discard'
  | 'half_cycles'
  | 'full_cycles'
  | 'clormann_seeger'
  | 'repeated'
  | 'rp_din45667';

export const RESIDUAL_METHODS: readonly ResidualMethod[] = [
  'none',
  'ignore',
  'no_finalize',
  'discard',
  'half_cycles',
  'full_cycles',
  'clormann_seeger',
  'repeated',
  'rp_din45667',
];

/** How the damage of a closed cycle is assigned to its turning points */
export type SpreadDamageMethod = 'none' | 'half_23' | 'full_p2' | 'full_p3';

export const SPREAD_DAMAGE_METHODS: readonly SpreadDamageMethod[] = ['none', 'half_23', 'full_p2', 'full_p3'];

/** Damage evaluation on a range pair histogram */
export type RpDamageMethod = 'default' | 'elementary' | 'modified' | 'consequent';

// ============================================================================
// DATA TYPES
// ============================================================================

/** A raw sample with its 1-based stream position */
export interface Sample {
  value: number;
  pos: number;
}

/** Turning point candidate */
export interface ValueTuple {
  value: number;
  /** Class index, base 0 */
  cls: number;
  /** Stream position, base 1 (0 = unknown) */
  pos: number;
  /** Position in turning point storage, base 1 (0 = not stored) */
  tpPos: number;
  /** Damage assigned to this point by damage spreading */
  damage: number;
}

/** One entry of a sparse rainflow matrix listing */
export interface MatrixItem {
  from: number;
  to: number;
  counts: number;
}

/** Class discretization */
export interface ClassParams {
  count: number;
  width: number;
  offset: number;
}

/** Runtime switches for the counting sinks */
export interface CountFlags {
  matrix: boolean;
  damage: boolean;
  rangePair: boolean;
  levelCrossingUp: boolean;
  levelCrossingDown: boolean;
  /** Spread cycle damage onto turning points and the damage history */
  damageHistory: boolean;
  /** Keep first and last sample as turning points, skip cycles within hysteresis */
  enforceMargin: boolean;
}

export const DEFAULT_COUNT_FLAGS: CountFlags = {
  matrix: true,
  damage: true,
  rangePair: true,
  levelCrossingUp: true,
  levelCrossingDown: true,
  damageHistory: true,
  enforceMargin: false,
};

/** Woehler (S-N) curve parameters */
export interface WoehlerParams {
  /** Amplitude at the primary point */
  sx: number;
  /** Cycles at the primary point */
  nx: number;
  /** Slope above sx */
  k: number;
  /** Fatigue strength amplitude */
  sd: number;
  /** Cycles at sd */
  nd: number;
  /** Slope below sx */
  k2: number;
  /** Amplitudes at or below are not damaging */
  omission: number;
  /** Impaired exponent for k, used by the consequent method */
  q: number;
  /** Impaired exponent for k2 */
  q2: number;
}

// ============================================================================
// COUNTING CONSTANTS
// ============================================================================

/** Weight of one full cycle */
export const FULL_CYCLE = 1;

/** Weight of one half cycle */
export const HALF_CYCLE = 0.5;

export const MAX_CLASS_COUNT = 1024;

export const DEFAULT_WOEHLER_SX = 1e3;
export const DEFAULT_WOEHLER_NX = 1e7;
export const DEFAULT_WOEHLER_K = -5;
