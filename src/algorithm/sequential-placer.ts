/**
 * Sequential Placer
 *
 * Greedy, left-to-right panel placement inside one region. Each band is walked
 * by a cursor that never moves backwards:
 *
 * - BRIDGE: one panel from the cursor past the next Cutout's right jamb
 * - ADVANCE / STOP_AT_OPENING: panels up to the next Cutout's left jamb (or the
 *   region end), split evenly so the run ends without a sliver
 * - HOP: skip an opening that cannot be bridged; the gap filler covers the
 *   space above and below it later
 */

import {
  Band,
  ClassifiedOpening,
  PanelConstraints,
  PanelOrientation,
  PlacedPanel,
  Region
} from './types';
import { leftClearanceZone, rightClearanceZone, intersectsBand } from './clearance';
import { isValidPanel, maxWidthForHeight } from './panel-validation';
import { calculateSegmentLayout } from './segment-layout';
import { snapDown, snapUp } from './utils/snap';
import { TOLERANCE } from './constants';
import { Logger } from './utils/logger';

// ============================================================================
// BANDS
// ============================================================================

/**
 * Horizontal strips of a region, bottom-up, one spacing apart.
 *
 * Horizontal orientation: strips of at most shortMax (and maxHeight).
 * Vertical orientation: one strip of the full region height, unless the
 * region is taller than maxHeight, in which case maxHeight strips are stacked.
 */
export function computeBands(
  region: Region,
  constraints: PanelConstraints,
  orientation: PanelOrientation
): Band[] {
  const { minHeight, maxHeight, shortMax, dimensionIncrement, panelSpacing } = constraints;
  const regionHeight = region.yEnd - region.yStart;

  if (orientation === 'vertical' && regionHeight <= maxHeight) {
    return [{ yStart: region.yStart, yEnd: region.yEnd }];
  }

  const stripMax = orientation === 'horizontal' ? Math.min(shortMax, maxHeight) : maxHeight;
  const bands: Band[] = [];
  let cy = region.yStart;

  while (cy < region.yEnd) {
    const remaining = region.yEnd - cy;
    const bandHeight = snapDown(Math.min(remaining, stripMax), dimensionIncrement);
    if (bandHeight < minHeight || bandHeight <= 0) {
      break;
    }
    bands.push({ yStart: cy, yEnd: cy + bandHeight });
    cy += bandHeight + panelSpacing;
  }

  return bands;
}

// ============================================================================
// SEAM VALIDATION
// ============================================================================

/**
 * Keeps a panel's right edge out of clearance zones.
 *
 * A seam strictly inside a zone snaps back to the zone's left jamb when the
 * panel stays wide enough, otherwise the panel grows past the right jamb when
 * that fits, otherwise it is clamped to the widest allowed panel.
 */
export function validateSeam(
  cursor: number,
  width: number,
  openings: readonly ClassifiedOpening[],
  maxWidth: number,
  regionEnd: number,
  constraints: PanelConstraints
): number {
  const { minWidth, dimensionIncrement } = constraints;
  const right = cursor + width;

  for (const op of openings) {
    const left = leftClearanceZone(op);
    const rightJamb = rightClearanceZone(op);
    if (!(left + TOLERANCE.seamInset < right && right < rightJamb - TOLERANCE.seamInset)) {
      continue;
    }

    Logger.debug(`Seam at ${right}" lands inside opening ${op.opening.id}, snapping`);

    const toLeftJamb = left - cursor;
    if (toLeftJamb >= minWidth) {
      return snapDown(toLeftJamb, dimensionIncrement);
    }

    const toClear = snapUp(rightJamb - cursor, dimensionIncrement);
    if (toClear <= maxWidth && cursor + toClear <= regionEnd) {
      Logger.debug(`Extending to right jamb of opening ${op.opening.id} (${toClear}")`);
      return toClear;
    }

    const clamped = snapDown(Math.min(maxWidth, regionEnd - cursor), dimensionIncrement);
    Logger.warn(
      `Cannot clear opening ${op.opening.id} (needs ${toClear}", max ${maxWidth}") - clamped to ${clamped}"`
    );
    return clamped;
  }

  return width;
}

// ============================================================================
// PLACEMENT
// ============================================================================

/**
 * Nearest opening the cursor has not passed yet, by left jamb
 */
function findNextOpening(
  openings: readonly ClassifiedOpening[],
  cursor: number
): ClassifiedOpening | undefined {
  let next: ClassifiedOpening | undefined;
  for (const op of openings) {
    if (rightClearanceZone(op) <= cursor + TOLERANCE.lookahead) continue;
    if (!next || leftClearanceZone(op) < leftClearanceZone(next)) {
      next = op;
    }
  }
  return next;
}

/**
 * Width of a panel from the cursor that fully covers `op`, or null when no
 * valid panel can.
 */
function bridgeWidth(
  op: ClassifiedOpening,
  cursor: number,
  bandHeight: number,
  maxWidth: number,
  regionEnd: number,
  constraints: PanelConstraints
): number | null {
  const { dimensionIncrement } = constraints;
  // A bridge shorter than minWidth is no bridge; the cursor stops or hops instead
  let width = snapUp(rightClearanceZone(op) - cursor, dimensionIncrement);

  // A zone running past the region end is covered up to the end
  if (cursor + width > regionEnd) {
    width = snapDown(regionEnd - cursor, dimensionIncrement);
    if (cursor + width < Math.min(rightClearanceZone(op), regionEnd) - TOLERANCE.seamInset) {
      return null;
    }
  }

  if (width > maxWidth || !isValidPanel(width, bandHeight, constraints)) {
    return null;
  }
  return width;
}

/**
 * Places panels left to right in one band of a region.
 */
export function placeBand(
  region: Region,
  band: Band,
  constraints: PanelConstraints
): PlacedPanel[] {
  const { minWidth, panelSpacing } = constraints;
  const bandHeight = band.yEnd - band.yStart;
  const maxWidth = maxWidthForHeight(bandHeight, constraints);
  const openings = region.openings.filter(o => intersectsBand(o, band.yStart, band.yEnd));
  const panels: PlacedPanel[] = [];

  let cursor = Math.max(0, region.xStart);

  while (region.xEnd - cursor >= minWidth) {
    const next = findNextOpening(openings, cursor);
    let stop = region.xEnd;
    let target: ClassifiedOpening | undefined;

    if (next) {
      const bridge = bridgeWidth(next, cursor, bandHeight, maxWidth, region.xEnd, constraints);
      if (bridge !== null) {
        Logger.debug(`[BRIDGE] ${bridge}" x ${bandHeight}" at ${cursor}" spans opening ${next.opening.id}`);
        panels.push({ x: cursor, y: band.yStart, w: bridge, h: bandHeight });
        cursor += bridge + panelSpacing;
        continue;
      }

      const left = leftClearanceZone(next);
      if (left <= cursor + TOLERANCE.lookahead) {
        Logger.warn(
          `Cannot bridge opening ${next.opening.id} from ${cursor}" (max ${maxWidth}") - hopping past it`
        );
        cursor = rightClearanceZone(next);
        continue;
      }
      stop = left;
      target = next;
    }

    const distance = stop - cursor;
    if (distance < minWidth) {
      if (target) {
        Logger.debug(`[HOP] ${distance}" gap before opening ${target.opening.id}, jumping past it`);
        cursor = rightClearanceZone(target);
        continue;
      }
      break;
    }

    let width = calculateSegmentLayout({
      distance,
      maxWidth,
      minWidth,
      increment: constraints.dimensionIncrement,
      spacing: panelSpacing
    });
    width = validateSeam(cursor, width, openings, maxWidth, region.xEnd, constraints);

    if (width <= 0 || !isValidPanel(width, bandHeight, constraints)) {
      Logger.warn(`Invalid panel ${width}" x ${bandHeight}" at ${cursor}" - band stopped`);
      break;
    }

    panels.push({ x: cursor, y: band.yStart, w: width, h: bandHeight });
    cursor += width + panelSpacing;
  }

  return panels;
}

/**
 * Places panels over every band of a region, bottom band first.
 */
export function placeRegion(
  region: Region,
  constraints: PanelConstraints,
  orientation: PanelOrientation
): PlacedPanel[] {
  const bands = computeBands(region, constraints, orientation);
  if (bands.length === 0) {
    Logger.warn(`Region ${region.xStart}"-${region.xEnd}" is too short for any panel band`);
  }
  return bands.flatMap(band => placeBand(region, band, constraints));
}
