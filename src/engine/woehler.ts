/**
 * Rainflow Engine - Woehler Damage Model
 * ======================================
 * S-N curve parameters, pseudo damage per cycle (Miner's rule) and the
 * curve helpers used to derive missing parameters
 */

import {
  WoehlerParams,
  DEFAULT_WOEHLER_SX,
  DEFAULT_WOEHLER_NX,
  DEFAULT_WOEHLER_K,
} from '../types';

// ============================================================================
// DAMAGE MODEL INTERFACE
// ============================================================================

/** Converts a cycle amplitude into pseudo damage of one full cycle */
export interface DamageModel {
  amplitudeDamage(sa: number): number;
}

// ============================================================================
// CURVE CONSTRUCTORS
// ============================================================================

/**
 * Single slope curve through `(sx, nx)`, no fatigue strength
 */
export function woehlerElementary(sx: number, nx: number, k: number): WoehlerParams {
  const slope = -Math.abs(k);
  return {
    sx,
    nx,
    k: slope,
    sd: 0,
    nd: Number.MAX_VALUE,
    k2: slope,
    omission: 0,
    q: Math.abs(k) - 1,
    q2: Math.abs(k) - 1,
  };
}

/**
 * Curve with fatigue strength at `(sd, nd)`, amplitudes below are not damaging
 */
export function woehlerOriginal(sd: number, nd: number, k: number): WoehlerParams {
  return { ...woehlerElementary(sd, nd, k), sd, nd };
}

/**
 * Two slopes, `k` above and `k2` below `(sx, nx)`
 */
export function woehlerModified(sx: number, nx: number, k: number, k2: number): WoehlerParams {
  return { ...woehlerElementary(sx, nx, k), k2, q2: Math.abs(k2) - 1 };
}

export type WoehlerInput = Pick<WoehlerParams, 'sx' | 'nx' | 'k'> & Partial<WoehlerParams>;

/**
 * Arbitrary parameter set, missing secondary values fall back to the elementary curve
 */
export function woehlerAny(input: WoehlerInput): WoehlerParams {
  const base = woehlerElementary(input.sx, input.nx, input.k);
  const k2 = input.k2 ?? base.k2;
  return {
    ...base,
    sd: input.sd ?? base.sd,
    nd: input.nd ?? base.nd,
    k2: -Math.abs(k2),
    q: input.q ?? base.q,
    q2: input.q2 ?? Math.abs(k2) - 1,
    omission: input.omission ?? base.omission,
  };
}

export function defaultWoehler(): WoehlerParams {
  return woehlerElementary(DEFAULT_WOEHLER_SX, DEFAULT_WOEHLER_NX, DEFAULT_WOEHLER_K);
}

/** Parameters are usable for damage evaluation */
export function isValidWoehler(params: WoehlerParams): boolean {
  return (
    params.sx > 0 &&
    params.nx > 0 &&
    params.k !== 0 &&
    params.sd >= 0 &&
    params.nd > 0 &&
    params.omission >= 0 &&
    [params.sx, params.nx, params.k, params.k2].every(Number.isFinite)
  );
}

// ============================================================================
// DAMAGE
// ============================================================================

/**
 * Pseudo damage of one full cycle with amplitude `sa`. Evaluated in the log
 * domain.
 */
export function woehlerDamage(params: WoehlerParams, sa: number): number {
  if (!(sa > params.omission)) return 0;

  const sxLog = Math.log(params.sx);
  const nxLog = Math.log(params.nx);

  if (sa > params.sx) {
    return Math.exp(Math.abs(params.k) * (Math.log(sa) - sxLog) - nxLog);
  }
  if (sa > params.sd) {
    return Math.exp(Math.abs(params.k2) * (Math.log(sa) - sxLog) - nxLog);
  }
  // Below fatigue strength
  return 0;
}

export class WoehlerCurve implements DamageModel {
  readonly params: Readonly<WoehlerParams>;

  constructor(params: WoehlerParams = defaultWoehler()) {
    this.params = Object.freeze({ ...params });
  }

  amplitudeDamage(sa: number): number {
    return woehlerDamage(this.params, sa);
  }

  /** Same curve without fatigue strength, `k2` kept */
  withoutFatigueStrength(): WoehlerCurve {
    return new WoehlerCurve({ ...this.params, sd: 0, nd: Number.MAX_VALUE });
  }
}

export function createWoehlerCurve(params?: WoehlerParams): WoehlerCurve {
  return new WoehlerCurve(params);
}

// ============================================================================
// CURVE HELPERS
// ============================================================================
// Each helper takes a known point (s0, n0) on the slope k and returns null for
// parameters that do not define a curve.

/** Amplitude of the knee point, given the second slope through (sd, nd) */
export function calcSx(s0: number, n0: number, k: number, nx: number, k2: number, sd: number, nd: number): number | null {
  const ka = Math.abs(k);
  const k2a = Math.abs(k2);
  if (s0 <= 0 || n0 <= 0 || nx <= 0 || sd <= 0 || nd <= 0) return null;

  const den = ka - k2a;
  if (den === 0) return null;

  const nom = Math.log(s0) * ka - Math.log(sd) * k2a + Math.log(n0) - Math.log(nd);
  return Math.exp(nom / den);
}

/** Fatigue strength amplitude at `nd` */
export function calcSd(s0: number, n0: number, k: number, sx: number, nx: number, k2: number, nd: number): number | null {
  const ka = Math.abs(k);
  const k2a = Math.abs(k2);
  if (s0 <= 0 || n0 <= 0 || sx <= 0 || nx <= 0 || nd <= 0) return null;
  if (k2a === 0) return null;

  const nom = Math.log(s0) * ka - Math.log(sx) * (ka - k2a) + Math.log(n0) - Math.log(nd);
  return Math.exp(nom / k2a);
}

/** Second slope through the knee point and (sd, nd), returned negative */
export function calcK2(s0: number, n0: number, k: number, sx: number, nx: number, sd: number, nd: number): number | null {
  const ka = Math.abs(k);
  if (s0 <= 0 || n0 <= 0 || sx <= 0 || nx <= 0 || sd <= 0 || nd <= 0) return null;

  const nom = (Math.log(s0) - Math.log(sx)) * ka + Math.log(n0) - Math.log(nd);
  const den = Math.log(sd) - Math.log(sx);
  if (den === 0) return -Number.MAX_VALUE;
  return -Math.abs(nom / den);
}

/** Amplitude bearable for `n` cycles */
export function calcSa(s0: number, n0: number, k: number, n: number): number | null {
  if (s0 <= 0 || n0 <= 0 || n <= 0) return null;
  return Math.pow(n0 / n, 1 / Math.abs(k)) * s0;
}

/** Cycles to failure at amplitude `sa` */
export function calcN(s0: number, n0: number, k: number, sa: number): number | null {
  if (s0 <= 0 || n0 <= 0 || sa <= 0) return null;
  return Math.pow(s0 / sa, Math.abs(k)) * n0;
}
