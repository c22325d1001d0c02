/**
 * Rainflow Engine - Cycle Strategy Tests
 * ======================================
 */

import { FourPointStrategy, HcmStrategy, AstmStrategy, isEnclosed, createCycleStrategy } from '../../src/engine/counting';
import { Residue } from '../../src/engine/residue';
import { createTuple } from '../../src/engine/turning-points';

type Emitted = [number, number, number];

function residueOf(values: number[]): Residue {
  const residue = new Residue(32);
  values.forEach((value, i) => residue.push(createTuple(value, value, i + 1)));
  return residue;
}

function values(residue: Residue): number[] {
  return residue.toArray().map((tp) => tp.value);
}

describe('Cycle strategies', () => {
  let emitted: Emitted[];
  const emit = (from: { value: number }, to: { value: number }, weight: number) => {
    emitted.push([from.value, to.value, weight]);
  };

  beforeEach(() => {
    emitted = [];
  });

  describe('isEnclosed', () => {
    it('should compare the inner range against the outer one', () => {
      expect(isEnclosed(0, 2, 1, 3)).toBe(true);
      expect(isEnclosed(1, 5, 1, 3)).toBe(false);
    });

    it('should close on ties', () => {
      expect(isEnclosed(0, 3, 0, 3)).toBe(true);
    });
  });

  describe('FourPointStrategy', () => {
    const strategy = new FourPointStrategy();

    it('should close the enclosed inner swing', () => {
      const residue = residueOf([1, 4, 2, 5]);
      strategy.findCycles(residue, emit);

      expect(emitted).toEqual([[4, 2, 1]]);
      expect(values(residue)).toEqual([1, 5]);
    });

    it('should leave a diverging residue alone', () => {
      const residue = residueOf([1, 5, 1, 3]);
      strategy.findCycles(residue, emit);

      expect(emitted).toEqual([]);
      expect(values(residue)).toEqual([1, 5, 1, 3]);
    });

    it('should close several cycles in one call', () => {
      const residue = residueOf([0, 5, 1, 4, 2, 3, 0]);
      // 4,2,3,0 closes 2-3, then 5,1,4,0 closes 1-4
      strategy.findCycles(residue, emit);

      expect(emitted).toEqual([
        [2, 3, 1],
        [1, 4, 1],
      ]);
      expect(values(residue)).toEqual([0, 5, 0]);
    });
  });

  describe('AstmStrategy', () => {
    const strategy = new AstmStrategy();

    it('should count a full cycle away from the residue start', () => {
      const residue = residueOf([0, 3, 1, 4]);
      strategy.findCycles(residue, emit);

      expect(emitted).toEqual([[3, 1, 1]]);
      expect(values(residue)).toEqual([0, 4]);
    });

    it('should count a half cycle containing the residue start', () => {
      const residue = residueOf([1, 4, 0]);
      strategy.findCycles(residue, emit);

      expect(emitted).toEqual([[1, 4, 0.5]]);
      expect(values(residue)).toEqual([4, 0]);
    });
  });

  describe('HcmStrategy', () => {
    it('should close cycles on its stack and hand the stack back on finalize', () => {
      const strategy = new HcmStrategy(10, 1);
      const residue = residueOf([2, -3, 1, -2, 4]);

      strategy.findCycles(residue, emit);

      expect(emitted).toEqual([[1, -2, 1]]);
      expect(residue.length).toBe(0);
      expect(strategy.getStack().map((tp) => tp.value)).toEqual([2, -3, 4]);

      strategy.finalize(residue);
      expect(values(residue)).toEqual([2, -3, 4]);
      expect(strategy.getStack()).toEqual([]);
    });

    it('should give the same result when fed point by point', () => {
      const strategy = new HcmStrategy(10, 1);
      const residue = new Residue(10);

      [2, -3, 1, -2, 4].forEach((value, i) => {
        residue.push(createTuple(value, 0, i + 1));
        strategy.findCycles(residue, emit);
      });

      expect(emitted).toEqual([[1, -2, 1]]);
      expect(strategy.getStack().map((tp) => tp.value)).toEqual([2, -3, 4]);
    });
  });

  describe('createCycleStrategy', () => {
    it('should create the strategy for each method', () => {
      expect(createCycleStrategy('4ptm', 9, 1).method).toBe('4ptm');
      expect(createCycleStrategy('hcm', 9, 1).method).toBe('hcm');
      expect(createCycleStrategy('astm', 9, 1).method).toBe('astm');
      expect(createCycleStrategy('none', 9, 1).method).toBe('none');
    });
  });
});
