/**
 * Region Splitter
 *
 * Partitions the wall width into regions free of Blockers. The span under each
 * Blocker is excluded from every region; it is filled above and below by the
 * final Blocker gap-fill pass instead.
 */

import { ClassifiedOpening, PanelConstraints, Region } from './types';
import { leftClearanceZone, rightClearanceZone } from './clearance';
import { spansOverlapX } from '../geometry/rectangle';
import { Logger } from './utils/logger';

/**
 * Builds the regions for a wall.
 *
 * @param blockers - Openings classified as Blockers
 * @param cutouts - Openings classified as Cutouts; each region gets the ones it intersects
 */
export function splitRegions(
  wallWidth: number,
  wallHeight: number,
  blockers: readonly ClassifiedOpening[],
  cutouts: readonly ClassifiedOpening[],
  constraints: PanelConstraints
): Region[] {
  if (blockers.length === 0) {
    return [{ xStart: 0, xEnd: wallWidth, yStart: 0, yEnd: wallHeight, openings: [...cutouts] }];
  }

  const spans = blockers.map(b => ({ left: leftClearanceZone(b), right: rightClearanceZone(b) }));

  // Zones past the far end would only add segments outside the wall
  const boundaries = [0, wallWidth];
  for (const span of spans) {
    boundaries.push(span.left, span.right);
  }
  const xs = Array.from(new Set(boundaries.map(x => Math.min(Math.max(x, 0), wallWidth))))
    .sort((a, b) => a - b);

  const regions: Region[] = [];
  for (let i = 0; i < xs.length - 1; i++) {
    const xStart = xs[i];
    const xEnd = xs[i + 1];

    if (spans.some(s => spansOverlapX(xStart, xEnd, s.left, s.right))) {
      continue;
    }

    if (xEnd - xStart < constraints.minWidth) {
      Logger.warn(
        `Segment ${xStart}"-${xEnd}" narrower than min panel width ${constraints.minWidth}" - skipped`
      );
      continue;
    }

    regions.push({
      xStart,
      xEnd,
      yStart: 0,
      yEnd: wallHeight,
      openings: cutouts.filter(c =>
        spansOverlapX(leftClearanceZone(c), rightClearanceZone(c), xStart, xEnd)
      )
    });
  }

  Logger.debug(`Split wall into ${regions.length} region(s) around ${blockers.length} blocker(s)`);
  return regions;
}
