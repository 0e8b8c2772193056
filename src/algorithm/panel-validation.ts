/**
 * Panel validity and collision checks
 */

import { PanelConstraints, PlacedPanel } from './types';
import { Rectangle } from '../types/geometry';
import { createRectangle, rectanglesOverlap } from '../geometry/rectangle';
import { TOLERANCE } from './constants';

const EPS = TOLERANCE.snapEpsilon;

/**
 * Validate panel dimensions against constraints.
 *
 * Width and height must sit within their [min, max] ranges and under longMax.
 * Aspect rule: a panel may exceed shortMax in at most one dimension.
 */
export function isValidPanel(w: number, h: number, constraints: PanelConstraints): boolean {
  if (!Number.isFinite(w) || !Number.isFinite(h)) return false;

  if (w < constraints.minWidth - EPS || h < constraints.minHeight - EPS) return false;
  if (w > constraints.maxWidth + EPS || h > constraints.maxHeight + EPS) return false;
  if (w > constraints.longMax + EPS || h > constraints.longMax + EPS) return false;

  return !(w > constraints.shortMax + EPS && h > constraints.shortMax + EPS);
}

/**
 * Widest panel allowed at a given height.
 * Taller than shortMax means the width must stay within shortMax.
 */
export function maxWidthForHeight(height: number, constraints: PanelConstraints): number {
  const aspectMax = height > constraints.shortMax ? constraints.shortMax : constraints.longMax;
  return Math.min(constraints.maxWidth, aspectMax);
}

export function panelRectangle(panel: PlacedPanel): Rectangle {
  return createRectangle(panel.x, panel.y, panel.w, panel.h);
}

/**
 * Two panels overlap when they share interior area; touching edges are fine.
 */
export function panelsOverlap(p1: PlacedPanel, p2: PlacedPanel): boolean {
  return rectanglesOverlap(panelRectangle(p1), panelRectangle(p2));
}
