/**
 * Rainflow Engine - Cycle Strategies
 * ==================================
 */

import { CountingMethod } from '../../types';
import { Residue } from '../residue';
import { CycleStrategy } from './types';
import { FourPointStrategy } from './four-point';
import { HcmStrategy } from './hcm';
import { AstmStrategy } from './astm';

export * from './types';
export * from './four-point';
export * from './hcm';
export * from './astm';

/** Counting method "none": turning points only, no cycles */
export class NoCountingStrategy implements CycleStrategy {
  readonly method = 'none' as const;

  findCycles(_residue: Residue): void {
    // No cycle closing
  }

  finalize(): void {
    // Nothing held outside the residue
  }

  reset(): void {
    // Stateless
  }
}

export function createCycleStrategy(method: CountingMethod, capacity: number, classWidth: number): CycleStrategy {
  switch (method) {
    case '4ptm':
      return new FourPointStrategy();
    case 'hcm':
      return new HcmStrategy(capacity, classWidth);
    case 'astm':
      return new AstmStrategy();
    case 'none':
      return new NoCountingStrategy();
  }
}
