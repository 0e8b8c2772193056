/**
 * Segment Layout
 *
 * Picks the width of the next panel in a run towards a fixed stop so the run
 * does not end in an unusable sliver.
 */

import { snapDown } from './utils/snap';
import { MAX_SEGMENT_ITERATIONS } from './constants';

export interface SegmentLayoutInput {
  distance: number;    // From the cursor to the stop
  maxWidth: number;
  minWidth: number;
  increment: number;
  spacing: number;
}

/**
 * Width of the IMMEDIATE next panel towards the stop.
 *
 * - Under minWidth: the raw distance comes back; the caller rejects it.
 * - Fits one panel: the whole distance, snapped down.
 * - Otherwise: the smallest panel count N with
 *   (distance - (N - 1) * spacing) / N <= maxWidth, snapped down, so the run
 *   is split evenly. Falls back to maxWidth when that share is below minWidth
 *   or no N is found within the iteration cap.
 */
export function calculateSegmentLayout(input: SegmentLayoutInput): number {
  const { distance, maxWidth, minWidth, increment, spacing } = input;

  if (distance < minWidth) {
    return distance;
  }

  if (distance <= maxWidth) {
    return snapDown(distance, increment);
  }

  for (let n = 2; n <= MAX_SEGMENT_ITERATIONS; n++) {
    const candidate = (distance - (n - 1) * spacing) / n;
    if (candidate <= maxWidth) {
      if (candidate < minWidth) {
        // Geometry conflict; take a full panel to keep moving
        return snapDown(maxWidth, increment);
      }
      return snapDown(candidate, increment);
    }
  }

  return snapDown(maxWidth, increment);
}
