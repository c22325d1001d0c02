/**
 * Rainflow Engine - Cycle Strategy Interface
 * ==========================================
 */

import { CountingMethod, ValueTuple } from '../../types';
import { Residue } from '../residue';

/** Receives each closed cycle with its weight */
export type CycleSink = (from: ValueTuple, to: ValueTuple, weight: number) => void;

export interface CycleStrategy {
  readonly method: CountingMethod;
  /** Close cycles on the residue tail, may close several at once */
  findCycles(residue: Residue, emit: CycleSink): void;
  /** End of stream, moves points held internally back into the residue */
  finalize(residue: Residue): void;
  reset(): void;
}
