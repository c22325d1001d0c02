/**
 * Rainflow Engine - ASTM Method
 * =============================
 * Three point method (ASTM E 1049). A range containing the first residue
 * point is counted as half cycle.
 */

import { FULL_CYCLE, HALF_CYCLE } from '../../types';
import { Residue } from '../residue';
import { CycleSink, CycleStrategy } from './types';

export class AstmStrategy implements CycleStrategy {
  readonly method = 'astm' as const;

  findCycles(residue: Residue, emit: CycleSink): void {
    while (residue.length >= 3) {
      const idx = residue.length - 3;
      const a = residue.at(idx);
      const b = residue.at(idx + 1);
      const c = residue.at(idx + 2);
      const y = Math.abs(a.cls - b.cls);
      const x = Math.abs(b.cls - c.cls);

      if (x < y) break;

      const z = residue.at(0).cls;
      if (z >= Math.min(a.cls, b.cls) && z <= Math.max(a.cls, b.cls)) {
        emit(a, b, HALF_CYCLE);
        residue.remove(idx, 1);
      } else {
        emit(a, b, FULL_CYCLE);
        residue.remove(idx, 2);
      }
    }
  }

  finalize(): void {
    // Nothing held outside the residue
  }

  reset(): void {
    // Stateless
  }
}
