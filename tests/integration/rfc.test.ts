/**
 * Rainflow Engine - One-Shot Counting Tests
 * =========================================
 */

import { rfc } from '../../src/engine/rfc';
import { turningPoints } from '../../src/engine/turning-points';
import { woehlerAny } from '../../src/engine/woehler';
import { RainflowError } from '../../src/core/errors';
import { initLogger } from '../../src/utils/logger';

describe('rfc', () => {
  beforeAll(() => {
    initLogger({ console: false });
  });

  const options = {
    classCount: 6,
    classWidth: 1,
    classOffset: 0.5,
    hysteresis: 1,
    woehler: woehlerAny({ sx: 1, nx: 1, k: -1 }),
  };
  const series = [2, 5, 3, 6, 2, 4, 1, 6, 1, 4, 1, 5, 3, 6, 3, 6, 1, 5, 2];

  it('should count a complete series', () => {
    const result = rfc(series, options);

    expect(result.matrix?.[4][2]).toBe(2);
    expect(result.matrix?.[0][5]).toBe(2);
    expect(result.rangePair?.counts).toEqual([0, 0, 3, 2, 0, 2]);
    expect(result.residue.map((tp) => tp.value)).toEqual([2, 6, 1, 5, 2]);
    expect(result.damage).toBeCloseTo(11, 10);
    expect(result.damageResidue).toBe(0);
    expect(result.turningPoints).toBeNull();
    expect(result.damageHistory).toBeNull();
  });

  it('should apply the residual method', () => {
    const result = rfc(series, { ...options, residualMethod: 'discard' });

    expect(result.residue).toEqual([]);
    expect(result.damageResidue).toBe(0);
  });

  it('should collect turning points and the damage history', () => {
    const result = rfc([1, 3, 2, 4], {
      classCount: 4,
      classWidth: 1,
      classOffset: 0.5,
      hysteresis: 0.99,
      woehler: woehlerAny({ sx: 1, nx: 1, k: -1 }),
      collectTurningPoints: true,
    });

    expect(result.turningPoints?.map((tp) => tp.value)).toEqual([1, 3, 2, 4]);
    expect(result.damageHistory).toHaveLength(3);
    expect(result.damageHistory?.[1]).toBeCloseTo(0.25, 10);
  });

  it('should store the same turning points the lazy sequence yields', () => {
    const result = rfc(series, { ...options, collectTurningPoints: true });
    const expected = Array.from(turningPoints(series, options.hysteresis));

    expect(result.turningPoints?.map((tp) => ({ value: tp.value, pos: tp.pos }))).toEqual(expected);
  });

  it('should throw the session error', () => {
    expect(() => rfc([1, 100], options)).toThrow(RainflowError);

    try {
      rfc([1, 100], options);
    } catch (error) {
      expect(error instanceof RainflowError && error.code).toBe('data_out_of_range');
    }
  });

  it('should throw on invalid options', () => {
    expect(() => rfc([1, 2], { classCount: 4, classWidth: -1 })).toThrow(RainflowError);
  });
});
