/**
 * Rainflow Engine - HCM Method
 * ============================
 * Three point stack algorithm after Clormann/Seeger. Turning points are
 * consumed from the residue front and held on an internal stack; closable
 * cycles are compared on raw values with a tolerance of 1% class width.
 */

import { ValueTuple, FULL_CYCLE } from '../../types';
import { InvariantViolation } from '../../core/errors';
import { Residue } from '../residue';
import { CycleSink, CycleStrategy } from './types';

export class HcmStrategy implements CycleStrategy {
  readonly method = 'hcm' as const;

  private stack: ValueTuple[] = [];
  /** Top of stack, base 1 (0 = empty) */
  private iz = 0;
  /** Deepest point from which cycles can close, base 1 */
  private ir = 1;
  private readonly eps: number;

  constructor(
    private readonly capacity: number,
    classWidth: number,
  ) {
    this.eps = classWidth / 100;
  }

  findCycles(residue: Residue, emit: CycleSink): void {
    const stack = this.stack;
    const eps = this.eps;
    let iz = this.iz - 1;
    let ir = this.ir - 1;

    while (residue.length > 0) {
      const k = residue.at(0);

      if (ir === 0) {
        stack[ir++] = k;
      }

      for (;;) {
        if (iz > ir) {
          const i = stack[iz - 1];
          const j = stack[iz];
          if ((k.value - j.value) * (j.value - i.value) + eps >= 0) {
            // J is no turning point
            iz--;
            continue;
          }
          if (Math.abs(k.value - j.value) + eps >= Math.abs(j.value - i.value)) {
            emit(i, j, FULL_CYCLE);
            iz -= 2;
            continue;
          }
        } else if (iz === ir) {
          const j = stack[iz];
          if ((k.value - j.value) * j.value + eps >= 0) {
            iz--;
            continue;
          }
          if (Math.abs(k.value) + eps > Math.abs(j.value)) {
            ir++;
          }
        }
        break;
      }

      iz++;
      if (iz >= this.capacity) {
        throw new InvariantViolation(`HCM stack overflow (capacity ${this.capacity})`);
      }
      stack[iz] = k;
      residue.remove(0, 1);
    }

    this.iz = iz + 1;
    this.ir = ir + 1;
  }

  /** Stack content becomes the residue */
  finalize(residue: Residue): void {
    if (this.iz > 0) {
      residue.replace(this.stack.slice(0, this.iz));
    }
    this.resetStack();
  }

  getStack(): ValueTuple[] {
    return this.stack.slice(0, this.iz).map((tp) => ({ ...tp }));
  }

  reset(): void {
    this.resetStack();
  }

  private resetStack(): void {
    this.stack = [];
    this.iz = 0;
    this.ir = 1;
  }
}
