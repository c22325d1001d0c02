/**
 * Rainflow Engine - Counting Session Tests
 * ========================================
 */

import { RainflowSession, createRainflowSession } from '../../src/engine/session';
import { RainflowOptions } from '../../src/engine/rainflow-config';
import { MemoryTurningPointStore } from '../../src/engine/tp-store';
import { MemoryDamageHistory } from '../../src/engine/damage';
import { CycleEvent } from '../../src/engine/counts';
import { woehlerAny } from '../../src/engine/woehler';
import { RainflowError } from '../../src/core/errors';
import { initLogger } from '../../src/utils/logger';

/** Woehler curve whose damage equals the amplitude */
const UNIT_WOEHLER = woehlerAny({ sx: 1, nx: 1, k: -1 });

const SMALL: RainflowOptions = {
  classCount: 4,
  classWidth: 1,
  classOffset: 0.5,
  hysteresis: 0.99,
  woehler: UNIT_WOEHLER,
};

const MIXED: RainflowOptions = {
  classCount: 6,
  classWidth: 1,
  classOffset: 0.5,
  hysteresis: 1,
  woehler: UNIT_WOEHLER,
};

const MIXED_SERIES = [2, 5, 3, 6, 2, 4, 1, 6, 1, 4, 1, 5, 3, 6, 3, 6, 1, 5, 2];

function residueValues(session: RainflowSession, includeInterim = false): number[] {
  return session.getResidue(includeInterim).map((tp) => tp.value);
}

function matrixSum(session: RainflowSession): number {
  return (session.getMatrix() ?? []).flat().reduce((sum, value) => sum + value, 0);
}

describe('RainflowSession', () => {
  beforeAll(() => {
    initLogger({ console: false });
  });

  describe('Lifecycle', () => {
    it('should start in init0 and move to init', () => {
      const session = new RainflowSession();
      expect(session.getState()).toBe('init0');

      expect(session.init(SMALL)).toBe(true);
      expect(session.getState()).toBe('init');
    });

    it('should initialize from constructor options', () => {
      expect(createRainflowSession(SMALL).getState()).toBe('init');
    });

    it('should follow the filter through busy and busy_interim', () => {
      const session = new RainflowSession(SMALL);

      session.feed([1]);
      expect(session.getState()).toBe('busy');

      session.feed([3]);
      expect(session.getState()).toBe('busy_interim');

      session.finalize();
      expect(session.getState()).toBe('finished');
    });

    it('should refuse a second init without poisoning the session', () => {
      const session = new RainflowSession(SMALL);

      expect(session.init(MIXED)).toBe(false);
      expect(session.getState()).toBe('init');
      expect(session.getError()).toBeNull();
      expect(session.getClasses()?.count).toBe(4);
    });

    it('should record invalid options as error', () => {
      const session = new RainflowSession();

      expect(session.init({ classCount: 4, classWidth: 0 })).toBe(false);
      expect(session.getState()).toBe('error');
      expect(session.getError()).toBe('invalid_argument');
    });

    it('should return to init0 on deinit and accept a new init', () => {
      const session = new RainflowSession({ classCount: 4, classWidth: 0 });
      session.deinit();

      expect(session.getState()).toBe('init0');
      expect(session.getError()).toBeNull();
      expect(session.init(SMALL)).toBe(true);
    });

    it('should reject feeding after finalize without an error code', () => {
      const session = new RainflowSession(SMALL);
      session.feed([1, 3, 2, 4]);
      session.finalize();

      expect(session.feed([1])).toBe(false);
      expect(session.finalize()).toBe(false);
      expect(session.getState()).toBe('finished');
      expect(session.getError()).toBeNull();
    });

    it('should reject feeding before init', () => {
      const session = new RainflowSession();

      expect(session.feed([1, 2])).toBe(false);
      expect(session.getState()).toBe('init0');
    });

    it('should clear counts and keep the configuration', () => {
      const session = new RainflowSession(SMALL);
      session.feed([1, 3, 2, 4]);
      session.finalize();

      expect(session.clearCounts()).toBe(true);
      expect(session.getState()).toBe('init');
      expect(session.getPosition()).toBe(0);
      expect(matrixSum(session)).toBe(0);
      expect(session.getDamage()).toBe(0);

      expect(session.feed([4, 2, 3, 1])).toBe(true);
      expect(session.finalize()).toBe(true);
      expect(session.getMatrix()?.[1][2]).toBe(1);
    });
  });

  describe('Counting', () => {
    it('should close the inner cycle of a rising series at finalize', () => {
      const session = new RainflowSession(SMALL);

      expect(session.feed([1, 3, 2, 4])).toBe(true);
      expect(matrixSum(session)).toBe(0);
      expect(session.finalize()).toBe(true);

      expect(session.getMatrix()?.[2][1]).toBe(1);
      expect(matrixSum(session)).toBe(1);
      expect(residueValues(session)).toEqual([1, 4]);
      expect(session.getPosition()).toBe(4);
    });

    it('should close the inner cycle of a falling series at finalize', () => {
      const session = new RainflowSession(SMALL);
      session.feed([4, 2, 3, 1]);
      session.finalize();

      expect(session.getMatrix()?.[1][2]).toBe(1);
      expect(matrixSum(session)).toBe(1);
      expect(residueValues(session)).toEqual([4, 1]);
    });

    it('should count a mixed series', () => {
      const session = new RainflowSession(MIXED);
      session.feed(MIXED_SERIES);
      session.finalize();

      const rfm = session.getMatrix();
      expect(rfm?.[4][2]).toBe(2);
      expect(rfm?.[5][2]).toBe(1);
      expect(rfm?.[0][3]).toBe(1);
      expect(rfm?.[1][3]).toBe(1);
      expect(rfm?.[0][5]).toBe(2);
      expect(matrixSum(session)).toBe(7);
      expect(residueValues(session)).toEqual([2, 6, 1, 5, 2]);
    });

    describe('chunking', () => {
      function results(chunks: number[][]) {
        const session = new RainflowSession(MIXED);
        for (const chunk of chunks) {
          expect(session.feed(chunk)).toBe(true);
        }
        session.finalize();
        return {
          matrix: session.getMatrix(),
          residue: session.getResidue(),
          damage: session.getDamage(),
          rangePair: session.getRangePair(),
          levelCrossing: session.getLevelCrossing(),
        };
      }

      const whole = () => results([MIXED_SERIES]);

      it('should give the same result when fed one sample at a time', () => {
        expect(results(MIXED_SERIES.map((value) => [value]))).toEqual(whole());
      });

      it('should give the same result for a split at every position', () => {
        const expected = whole();
        for (let at = 0; at <= MIXED_SERIES.length; at++) {
          expect(results([MIXED_SERIES.slice(0, at), MIXED_SERIES.slice(at)])).toEqual(expected);
        }
      });

      it('should give the same result for uneven chunks', () => {
        expect(results([MIXED_SERIES.slice(0, 5), MIXED_SERIES.slice(5, 12), MIXED_SERIES.slice(12)])).toEqual(
          whole(),
        );
      });
    });

    it('should finish an empty series with nothing counted', () => {
      const session = new RainflowSession(SMALL);

      expect(session.finalize()).toBe(true);
      expect(session.getState()).toBe('finished');
      expect(matrixSum(session)).toBe(0);
      expect(session.getResidue()).toEqual([]);
    });

    it('should take only count samples', () => {
      const session = new RainflowSession(SMALL);

      expect(session.feed([1, 3, 2, 4], 2)).toBe(true);
      expect(session.getPosition()).toBe(2);
    });

    it('should accumulate damage with the Woehler curve', () => {
      const session = new RainflowSession(MIXED);
      session.feed(MIXED_SERIES);
      session.finalize();

      // Amplitudes: 2 x 1, 1.5, 1.5, 1, 2 x 2.5
      expect(session.getDamage()).toBeCloseTo(11, 10);
      expect(session.getDamageResidue()).toBe(0);
    });

    it('should report damage closed while finalizing as residue damage', () => {
      const session = new RainflowSession(SMALL);
      session.feed([1, 3, 2, 4]);
      session.finalize();

      expect(session.getDamage()).toBeCloseTo(0.5, 10);
      expect(session.getDamageResidue()).toBeCloseTo(0.5, 10);
    });

    it('should count level crossings per slope', () => {
      const session = new RainflowSession(SMALL);
      session.feed([1, 3, 2, 4]);
      session.finalize();

      expect(session.getLevelCrossing()).toEqual({ counts: [1, 3, 1, 0], levels: [1.5, 2.5, 3.5, 4.5] });
    });

    it('should fill the range pair histogram', () => {
      const session = new RainflowSession(SMALL);
      session.feed([1, 3, 2, 4]);
      session.finalize();

      expect(session.getRangePair()).toEqual({ counts: [0, 1, 0, 0], amplitudes: [0, 0.5, 1, 1.5] });
    });

    it('should report each cycle to the listener', () => {
      const session = new RainflowSession(SMALL);
      const events: CycleEvent[] = [];
      session.onCycle((event) => events.push(event));

      session.feed([1, 3, 2, 4]);
      session.finalize();

      expect(events).toHaveLength(1);
      expect(events[0].from.value).toBe(3);
      expect(events[0].to.value).toBe(2);
      expect(events[0].weight).toBe(1);
    });

    it('should feed scaled samples', () => {
      const session = new RainflowSession(SMALL);
      session.feedScaled([0.5, 1.5, 1, 2], 2);
      session.finalize();

      expect(session.getMatrix()?.[2][1]).toBe(1);
    });

    it('should feed pre-classified tuples', () => {
      const session = new RainflowSession(SMALL);
      const tuples = [1, 3, 2, 4].map((value, i) => ({ value, cls: Math.trunc(value - 0.5), pos: i + 1, tpPos: 0, damage: 0 }));

      expect(session.feedTuples(tuples)).toBe(true);
      session.finalize();
      expect(session.getMatrix()?.[2][1]).toBe(1);
      expect(session.getPosition()).toBe(0);
    });

    it('should count a cycle given directly on every sink', () => {
      const session = new RainflowSession(SMALL);

      expect(session.processCycle(1, 4)).toBe(true);
      expect(session.getMatrix()?.[0][3]).toBe(1);
      expect(session.getRangePair()?.counts).toEqual([0, 0, 0, 1]);
      expect(session.getLevelCrossing()?.counts).toEqual([2, 2, 2, 0]);
      expect(session.getDamage()).toBeCloseTo(1.5, 10);
    });

    it('should keep the interim point out of the residue until finalize', () => {
      const session = new RainflowSession(SMALL);
      session.feed([1, 3, 2, 4]);

      expect(residueValues(session)).toEqual([1, 3, 2]);
      expect(residueValues(session, true)).toEqual([1, 3, 2, 4]);
    });
  });

  describe('Turning point storage', () => {
    it('should store every turning point and spread damage onto them', () => {
      const store = new MemoryTurningPointStore();
      const history = new MemoryDamageHistory();
      const session = new RainflowSession({ ...SMALL, turningPointStore: store, damageHistory: history });

      session.feed([1, 3, 2, 4]);
      session.finalize();

      expect(store.toArray().map((tp) => [tp.value, tp.tpPos])).toEqual([
        [1, 1],
        [3, 2],
        [2, 3],
        [4, 4],
      ]);
      expect(store.toArray().map((tp) => tp.damage)).toEqual([0, 0.25, 0.25, 0].map((d) => expect.closeTo(d, 10)));
      expect(history.toArray()).toEqual([0, 0.25, 0.25].map((d) => expect.closeTo(d, 10)));
    });

    it('should keep the stream margins with enforced margins', () => {
      const store = new MemoryTurningPointStore();
      const session = new RainflowSession({
        ...SMALL,
        flags: { enforceMargin: true },
        turningPointStore: store,
      });

      session.feed([1, 3, 2, 4, 3.5]);
      session.finalize();

      expect(store.toArray().map((tp) => tp.value)).toEqual([1, 3, 2, 4, 3.5]);
    });

    it('should store a right margin equal to the last turning point once', () => {
      const store = new MemoryTurningPointStore();
      const session = new RainflowSession({
        ...SMALL,
        flags: { enforceMargin: true },
        turningPointStore: store,
      });

      session.feed([1, 3, 2, 4]);
      session.finalize();

      expect(store.toArray().map((tp) => tp.value)).toEqual([1, 3, 2, 4]);
    });

    it('should empty the store when counts are cleared', () => {
      const store = new MemoryTurningPointStore();
      const session = new RainflowSession({ ...SMALL, turningPointStore: store });
      session.feed([1, 3, 2, 4]);

      session.clearCounts();
      expect(store.size).toBe(0);
    });
  });

  describe('Errors', () => {
    it('should fail on samples outside the class range and stay failed', () => {
      const session = new RainflowSession(SMALL);

      expect(session.feed([1, 100])).toBe(false);
      expect(session.getState()).toBe('error');
      expect(session.getError()).toBe('data_out_of_range');
      expect(session.getPosition()).toBe(1);

      expect(session.feed([1])).toBe(false);
      expect(session.finalize()).toBe(false);
      expect(session.getError()).toBe('data_out_of_range');
    });

    it('should fail on non-finite samples', () => {
      const session = new RainflowSession(SMALL);

      expect(session.feed([1, NaN])).toBe(false);
      expect(session.getError()).toBe('invalid_argument');
    });

    it('should fail on an invalid sample count', () => {
      const session = new RainflowSession(SMALL);

      expect(session.feed([1, 2], 3)).toBe(false);
      expect(session.getError()).toBe('invalid_argument');
    });

    it('should fail on an invalid scale factor', () => {
      const session = new RainflowSession(SMALL);

      expect(session.feedScaled([1, 2], Infinity)).toBe(false);
      expect(session.getError()).toBe('invalid_argument');
    });

    it('should expose the failure as RainflowError', () => {
      const session = new RainflowSession(SMALL);
      expect(session.toError()).toBeNull();

      session.feed([100]);
      const error = session.toError();

      expect(error).toBeInstanceOf(RainflowError);
      expect(error?.code).toBe('data_out_of_range');
      expect(error?.httpStatus).toBe(400);
      expect(error?.state).toBe('error');
    });

    it('should turn a throwing cycle listener into an unexpected error', () => {
      const session = new RainflowSession(SMALL);
      session.onCycle(() => {
        throw new Error('listener failed');
      });

      session.feed([1, 3, 2, 4]);
      expect(session.finalize()).toBe(false);
      expect(session.getError()).toBe('unexpected');
      expect(session.getErrorMessage()).toBe('listener failed');
    });
  });

  describe('Class helpers', () => {
    it('should classify values and report class bounds', () => {
      const session = new RainflowSession(SMALL);

      expect(session.classNumber(2.7)).toBe(2);
      expect(session.classNumber(100)).toBeNull();
      expect(session.classMean(1)).toBe(2);
      expect(session.classUpper(1)).toBe(2.5);
      expect(session.classMean(4)).toBeNull();
      expect(session.getHysteresis()).toBe(0.99);
    });
  });

  describe('Matrix operations', () => {
    let session: RainflowSession;

    beforeEach(() => {
      session = new RainflowSession(MIXED);
      session.feed(MIXED_SERIES);
      session.finalize();
    });

    it('should list non-zero cells in row-major order', () => {
      expect(session.rfmNonZeros()).toBe(5);
      expect(session.rfmGet()).toEqual([
        { from: 0, to: 3, counts: 1 },
        { from: 0, to: 5, counts: 2 },
        { from: 1, to: 3, counts: 1 },
        { from: 4, to: 2, counts: 2 },
        { from: 5, to: 2, counts: 1 },
      ]);
    });

    it('should have an empty diagonal', () => {
      expect(session.rfmCheck()).toBe(true);
    });

    it('should fold the matrix onto its upper triangle', () => {
      expect(session.rfmMakeSymmetric()).toBe(true);

      const rfm = session.getMatrix();
      expect(rfm?.[2][4]).toBe(2);
      expect(rfm?.[2][5]).toBe(1);
      expect(rfm?.[4][2]).toBe(0);
      expect(rfm?.[5][2]).toBe(0);
      expect(matrixSum(session)).toBe(7);
    });

    it('should sum regions with inclusive bounds', () => {
      expect(session.rfmSum({ fromFirst: 0, fromLast: 5, toFirst: 0, toLast: 5 })).toBe(7);
      expect(session.rfmSum({ fromFirst: 0, fromLast: 1, toFirst: 3, toLast: 5 })).toBe(4);
    });

    it('should throw on an invalid region', () => {
      expect(() => session.rfmSum({ fromFirst: 3, fromLast: 1, toFirst: 0, toLast: 5 })).toThrow(RainflowError);
      expect(() => session.rfmSum({ fromFirst: 0, fromLast: 6, toFirst: 0, toLast: 5 })).toThrow(RainflowError);
    });

    it('should evaluate the damage of a region', () => {
      // Cells [0][3] and [0][5]: 1.5 + 2 * 2.5
      expect(session.rfmDamage({ fromFirst: 0, fromLast: 0, toFirst: 0, toLast: 5 })).toBeCloseTo(6.5, 10);
      expect(session.damageFromRfm()).toBeCloseTo(11, 10);
    });

    it('should replace and add matrix items', () => {
      expect(session.rfmSet([{ from: 1, to: 2, counts: 3 }])).toBe(true);
      expect(session.rfmGet()).toEqual([{ from: 1, to: 2, counts: 3 }]);

      expect(session.rfmSet([{ from: 1, to: 2, counts: 1 }], true)).toBe(true);
      expect(session.rfmGet()).toEqual([{ from: 1, to: 2, counts: 4 }]);
    });

    it('should peek and poke cells by value', () => {
      expect(session.rfmPeek(5, 3)).toBe(2);

      expect(session.rfmPoke(5, 3, 1, true)).toBe(true);
      expect(session.rfmPeek(5, 3)).toBe(3);

      expect(session.rfmPoke(5, 3, 0)).toBe(true);
      expect(session.rfmPeek(5, 3)).toBe(0);
    });

    it('should clamp values beyond the class range', () => {
      expect(session.rfmPeek(-100, 100)).toBe(2);
    });

    it('should derive histograms from the matrix', () => {
      expect(session.rpFromRfm()?.counts).toEqual([0, 0, 3, 2, 0, 2]);
      expect(session.rpFromRfm()?.counts).toEqual(session.getRangePair()?.counts);
      expect(session.lcFromRfm(true, false)?.counts).toEqual([3, 4, 7, 5, 3, 0]);
      expect(session.lcFromRfm()?.counts).toEqual([6, 8, 14, 10, 6, 0]);
    });

    it('should evaluate the range pair histogram', () => {
      expect(session.damageFromRp()).toBeCloseTo(11, 10);
    });
  });

  describe('Disabled sinks', () => {
    it('should return null for a disabled matrix and refuse to change it', () => {
      const session = new RainflowSession({ ...SMALL, flags: { matrix: false } });
      session.feed([1, 3, 2, 4]);

      expect(session.getMatrix()).toBeNull();
      expect(session.rfmGet()).toBeNull();
      expect(session.rfmSet([])).toBe(false);
      expect(session.getError()).toBe('unsupported');
    });

    it('should count turning points only in pass-through mode', () => {
      const session = new RainflowSession({ classCount: 0, hysteresis: 0.99 });

      expect(session.feed([1, 3, 2, 4, 100])).toBe(true);
      expect(residueValues(session)).toEqual([2]);
      expect(session.getMatrix()).toBeNull();
      expect(session.getRangePair()).toBeNull();

      session.finalize();
      expect(session.getResidue()).toEqual([]);
    });
  });
});
