/**
 * Rainflow Engine - Quantizer
 * ===========================
 * Maps raw values onto class indices (bins) of the value axis
 */

import { ClassParams } from '../types';

/**
 * Class index of a value, base 0. Returns 0 in pass-through mode
 * (`count == 0`). The result is not clamped, use `isInRange()` first.
 */
export function quantize(params: ClassParams, value: number): number {
  if (!params.count) return 0;
  return Math.trunc((value - params.offset) / params.width);
}

/**
 * Class index clamped to `[0, count-1]`
 */
export function quantizeClamped(params: ClassParams, value: number): number {
  if (!params.count) return 0;
  const cls = quantize(params, value);
  if (cls < 0) return 0;
  return cls >= params.count ? params.count - 1 : cls;
}

/**
 * A value can be classified when it lies within `[offset, offset + count*width)`
 */
export function isInRange(params: ClassParams, value: number): boolean {
  if (!params.count) return true;
  const cls = quantize(params, value);
  return value >= params.offset && cls < params.count;
}

/** Center of class `cls` */
export function classMean(params: ClassParams, cls: number): number {
  return params.count ? params.width * (0.5 + cls) + params.offset : 0;
}

/** Upper bound of class `cls` */
export function classUpper(params: ClassParams, cls: number): number {
  return params.count ? params.width * (1 + cls) + params.offset : 0;
}

/** Lower bound of class `cls` */
export function classLower(params: ClassParams, cls: number): number {
  return params.count ? params.width * cls + params.offset : 0;
}

/** Amplitude of a range of `range` classes */
export function rangeAmplitude(params: ClassParams, range: number): number {
  return (params.width * range) / 2;
}
