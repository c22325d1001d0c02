/**
 * Rainflow Engine - Quantizer Tests
 * =================================
 */

import {
  quantize,
  quantizeClamped,
  isInRange,
  classMean,
  classUpper,
  classLower,
  rangeAmplitude,
} from '../../src/engine/classes';
import { ClassParams } from '../../src/types';

describe('Quantizer', () => {
  const classes: ClassParams = { count: 4, width: 1, offset: 0.5 };

  describe('quantize', () => {
    it('should map values onto class indices', () => {
      expect(quantize(classes, 1)).toBe(0);
      expect(quantize(classes, 2.4)).toBe(1);
      expect(quantize(classes, 4)).toBe(3);
    });

    it('should not clamp values above the range', () => {
      expect(quantize(classes, 4.5)).toBe(4);
    });

    it('should return 0 in pass-through mode', () => {
      expect(quantize({ count: 0, width: 1, offset: 0 }, 123.4)).toBe(0);
    });
  });

  describe('quantizeClamped', () => {
    it('should clamp to the first and last class', () => {
      expect(quantizeClamped(classes, -10)).toBe(0);
      expect(quantizeClamped(classes, 100)).toBe(3);
      expect(quantizeClamped(classes, 2)).toBe(1);
    });
  });

  describe('isInRange', () => {
    it('should accept the half-open interval [offset, offset + count*width)', () => {
      expect(isInRange(classes, 0.5)).toBe(true);
      expect(isInRange(classes, 4.49)).toBe(true);
      expect(isInRange(classes, 4.5)).toBe(false);
      expect(isInRange(classes, 0.4)).toBe(false);
    });

    it('should accept everything in pass-through mode', () => {
      expect(isInRange({ count: 0, width: 1, offset: 0 }, -1e9)).toBe(true);
    });
  });

  describe('class bounds', () => {
    it('should compute mean, upper and lower bounds', () => {
      expect(classMean(classes, 0)).toBe(1);
      expect(classUpper(classes, 0)).toBe(1.5);
      expect(classLower(classes, 2)).toBe(2.5);
    });

    it('should compute the amplitude of a range', () => {
      expect(rangeAmplitude(classes, 3)).toBe(1.5);
      expect(rangeAmplitude({ count: 10, width: 2, offset: 0 }, 3)).toBe(3);
    });
  });
});
