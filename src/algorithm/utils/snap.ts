/**
 * Snapping panel dimensions to the fabrication increment
 */

import { TOLERANCE } from '../constants';

/**
 * Rounds down to the nearest multiple of `increment`.
 * Values within float noise of a multiple stay on it (47.99999999 -> 48).
 * A non-positive or non-finite increment leaves the value untouched.
 */
export function snapDown(value: number, increment: number): number {
  if (!Number.isFinite(value)) return 0;
  if (!(increment > 0)) return value;
  return Math.floor(value / increment + TOLERANCE.snapEpsilon) * increment;
}

/**
 * Rounds up to the nearest multiple of `increment`.
 */
export function snapUp(value: number, increment: number): number {
  if (!Number.isFinite(value)) return 0;
  if (!(increment > 0)) return value;
  return Math.ceil(value / increment - TOLERANCE.snapEpsilon) * increment;
}
