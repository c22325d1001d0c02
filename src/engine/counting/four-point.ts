/**
 * Rainflow Engine - 4-Point Method
 * ================================
 * Closes the inner swing B-C when it is enclosed by the outer swing A-D
 */

import { FULL_CYCLE } from '../../types';
import { Residue } from '../residue';
import { CycleSink, CycleStrategy } from './types';

/** Inner range B..C lies within A..D, compared on class indices. Ties close. */
export function isEnclosed(a: number, b: number, c: number, d: number): boolean {
  const lo = Math.min(b, c);
  const hi = Math.max(b, c);
  return Math.min(a, d) <= lo && hi <= Math.max(a, d);
}

export class FourPointStrategy implements CycleStrategy {
  readonly method = '4ptm' as const;

  findCycles(residue: Residue, emit: CycleSink): void {
    while (residue.length >= 4) {
      const idx = residue.length - 4;
      const a = residue.at(idx);
      const b = residue.at(idx + 1);
      const c = residue.at(idx + 2);
      const d = residue.at(idx + 3);

      if (!isEnclosed(a.cls, b.cls, c.cls, d.cls)) break;

      emit(b, c, FULL_CYCLE);
      residue.remove(idx + 1, 2);
    }
  }

  finalize(): void {
    // Nothing held outside the residue
  }

  reset(): void {
    // Stateless
  }
}
