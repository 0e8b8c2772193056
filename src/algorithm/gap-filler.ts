/**
 * Gap Filler
 *
 * Tiles the vertical gaps left above and below openings with rows of panels.
 * Runs after the sequential placer, so every candidate is checked against the
 * panels already on the wall.
 */

import { ClassifiedOpening, PanelConstraints, PlacedPanel, Region } from './types';
import {
  leftClearanceZone,
  rightClearanceZone,
  bottomClearanceZone,
  topClearanceZone,
  clearanceRectangle
} from './clearance';
import { isStorefrontLike } from './classifier';
import { isValidPanel, maxWidthForHeight, panelRectangle, panelsOverlap } from './panel-validation';
import { calculateSegmentLayout } from './segment-layout';
import { rectanglesOverlap } from '../geometry/rectangle';
import { snapDown } from './utils/snap';
import { Logger } from './utils/logger';

export interface GapArea {
  xStart: number;
  xEnd: number;
  yStart: number;
  yEnd: number;
  label: string;
}

/**
 * Fills one rectangular gap row by row, bottom-up.
 *
 * A row stops at the first candidate that is invalid, overlaps a placed panel,
 * or intrudes into a Blocker's clearance zone. Cutout zones may be covered.
 *
 * @param placed - Panels already on the wall; not modified
 * @returns Only the panels added for this gap, in placement order
 */
export function fillGap(
  gap: GapArea,
  placed: readonly PlacedPanel[],
  blockers: readonly ClassifiedOpening[],
  constraints: PanelConstraints
): PlacedPanel[] {
  const { minWidth, minHeight, maxHeight, longMax, dimensionIncrement, panelSpacing } = constraints;
  const gapWidth = gap.xEnd - gap.xStart;
  const gapHeight = gap.yEnd - gap.yStart;

  if (gapWidth < minWidth || gapHeight < minHeight) {
    return [];
  }

  Logger.debug(`Gap ${gap.label}: ${gapWidth}" W x ${gapHeight}" H at (${gap.xStart}, ${gap.yStart})`);

  const keepOut = blockers.map(clearanceRectangle);
  const added: PlacedPanel[] = [];
  let y = gap.yStart;

  while (gap.yEnd - y >= minHeight) {
    const rowHeight = snapDown(Math.min(gap.yEnd - y, maxHeight, longMax), dimensionIncrement);
    if (rowHeight < minHeight || rowHeight <= 0) {
      break;
    }

    const rowMaxWidth = maxWidthForHeight(rowHeight, constraints);
    let x = gap.xStart;
    let rowPlaced = false;

    while (gap.xEnd - x >= minWidth) {
      const width = calculateSegmentLayout({
        distance: gap.xEnd - x,
        maxWidth: rowMaxWidth,
        minWidth,
        increment: dimensionIncrement,
        spacing: panelSpacing
      });

      if (width <= 0 || !isValidPanel(width, rowHeight, constraints)) {
        Logger.debug(`Fill-${gap.label}: invalid ${width}" x ${rowHeight}", stopping row`);
        break;
      }

      const candidate: PlacedPanel = { x, y, w: width, h: rowHeight };

      if (placed.some(p => panelsOverlap(candidate, p)) || added.some(p => panelsOverlap(candidate, p))) {
        Logger.debug(`Fill-${gap.label}: overlap at (${x}, ${y}), stopping row`);
        break;
      }

      const rect = panelRectangle(candidate);
      if (keepOut.some(zone => rectanglesOverlap(rect, zone))) {
        Logger.debug(`Fill-${gap.label}: blocker clearance at (${x}, ${y}), stopping row`);
        break;
      }

      added.push(candidate);
      rowPlaced = true;
      x += width + panelSpacing;
    }

    if (!rowPlaced) {
      break;
    }
    y += rowHeight + panelSpacing;
  }

  if (added.length > 0) {
    Logger.debug(`Added ${added.length} gap-fill panel(s) ${gap.label}`);
  }
  return added;
}

/**
 * Gap areas below and above a zone, skipping any shorter than a panel
 */
function verticalGaps(
  cleared: ClassifiedOpening,
  xStart: number,
  xEnd: number,
  wallHeight: number,
  minHeight: number
): GapArea[] {
  const id = cleared.opening.id;
  const bottom = bottomClearanceZone(cleared);
  const top = topClearanceZone(cleared);
  const gaps: GapArea[] = [];

  if (bottom > 0 && bottom >= minHeight) {
    gaps.push({ xStart, xEnd, yStart: 0, yEnd: bottom, label: `below ${id}` });
  }
  if (top < wallHeight && wallHeight - top >= minHeight) {
    gaps.push({ xStart, xEnd, yStart: top, yEnd: wallHeight, label: `above ${id}` });
  }
  return gaps;
}

/**
 * Fills above and below the Cutouts of a region.
 *
 * Fill spans the opening's clearance width (inset by one spacing), or the
 * whole region for storefronts.
 */
export function fillCutoutGaps(
  region: Region,
  wallHeight: number,
  placed: readonly PlacedPanel[],
  blockers: readonly ClassifiedOpening[],
  constraints: PanelConstraints
): PlacedPanel[] {
  const spacing = constraints.panelSpacing;
  const added: PlacedPanel[] = [];

  for (const cutout of region.openings) {
    const storefront = isStorefrontLike(cutout.opening);

    if (!storefront && bottomClearanceZone(cutout) <= 0 && topClearanceZone(cutout) >= wallHeight) {
      continue;
    }

    const xStart = storefront
      ? region.xStart + spacing
      : Math.max(leftClearanceZone(cutout) + spacing, region.xStart);
    const xEnd = storefront
      ? region.xEnd - spacing
      : Math.min(rightClearanceZone(cutout) - spacing, region.xEnd);

    for (const gap of verticalGaps(cutout, xStart, xEnd, wallHeight, constraints.minHeight)) {
      added.push(...fillGap(gap, [...placed, ...added], blockers, constraints));
    }
  }

  return added;
}

/**
 * Fills above and below every Blocker across its own span.
 * These spans belong to no region, so this runs once per wall.
 */
export function fillBlockerGaps(
  blockers: readonly ClassifiedOpening[],
  wallWidth: number,
  wallHeight: number,
  placed: readonly PlacedPanel[],
  constraints: PanelConstraints
): PlacedPanel[] {
  const spacing = constraints.panelSpacing;
  const added: PlacedPanel[] = [];

  for (const blocker of blockers) {
    const xStart = leftClearanceZone(blocker) + spacing;
    const xEnd = Math.min(rightClearanceZone(blocker) - spacing, wallWidth);

    for (const gap of verticalGaps(blocker, xStart, xEnd, wallHeight, constraints.minHeight)) {
      added.push(...fillGap(gap, [...placed, ...added], blockers, constraints));
    }
  }

  if (added.length > 0) {
    Logger.debug(`Blocker gap fill added ${added.length} panel(s)`);
  }
  return added;
}
