/**
 * Rainflow Engine - One-Shot Counting
 * ===================================
 * Count a complete series in one call, failures are thrown
 */

import { ResidualMethod, ValueTuple } from '../types';
import { RainflowError } from '../core/errors';
import { RainflowOptions } from './rainflow-config';
import { RainflowSession } from './session';
import { LevelCrossingHistogram, RangePairHistogram } from './histograms';
import { MemoryTurningPointStore } from './tp-store';
import { MemoryDamageHistory } from './damage';

export interface RfcOptions extends RainflowOptions {
  residualMethod?: ResidualMethod;
  /** Keep all turning points (and the damage history) in memory */
  collectTurningPoints?: boolean;
}

export interface RfcResult {
  damage: number;
  damageResidue: number;
  matrix: number[][] | null;
  rangePair: RangePairHistogram | null;
  levelCrossing: LevelCrossingHistogram | null;
  residue: ValueTuple[];
  turningPoints: ValueTuple[] | null;
  damageHistory: number[] | null;
}

export function rfc(data: ArrayLike<number>, options: RfcOptions): RfcResult {
  const { residualMethod = 'none', collectTurningPoints = false, ...sessionOptions } = options;

  const store = collectTurningPoints ? sessionOptions.turningPointStore ?? new MemoryTurningPointStore() : null;
  const history = collectTurningPoints ? sessionOptions.damageHistory ?? new MemoryDamageHistory() : null;

  const session = new RainflowSession();
  const ok =
    session.init({
      ...sessionOptions,
      turningPointStore: store ?? sessionOptions.turningPointStore,
      damageHistory: history ?? sessionOptions.damageHistory,
    }) &&
    session.feed(data) &&
    session.finalize(residualMethod);

  if (!ok) {
    throw session.toError() ?? new RainflowError('unexpected', 'Counting failed without an error code');
  }

  return {
    damage: session.getDamage(),
    damageResidue: session.getDamageResidue(),
    matrix: session.getMatrix(),
    rangePair: session.getRangePair(),
    levelCrossing: session.getLevelCrossing(),
    residue: session.getResidue(),
    turningPoints: store instanceof MemoryTurningPointStore ? store.toArray() : null,
    damageHistory: history instanceof MemoryDamageHistory ? history.toArray() : null,
  };
}
