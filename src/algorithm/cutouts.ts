/**
 * Cutout Calculator
 *
 * The hole cut into a panel is the intersection of the panel with the
 * opening's clearance zone, so jamb/header/sill margins are cut out as well.
 */

import { ClassifiedOpening, PanelCutout, PlacedPanel } from './types';
import { clearanceRectangle } from './clearance';
import { panelRectangle } from './panel-validation';
import { rectangleIntersection } from '../geometry/rectangle';

/**
 * Cutouts for one panel, in panel-local coordinates.
 * Only Cutout openings produce holes; Blockers are never covered.
 */
export function calculatePanelCutouts(
  panel: PlacedPanel,
  openings: readonly ClassifiedOpening[]
): PanelCutout[] {
  const cutouts: PanelCutout[] = [];
  const rect = panelRectangle(panel);

  for (const cleared of openings) {
    if (cleared.kind !== 'cutout') continue;

    const hole = rectangleIntersection(rect, clearanceRectangle(cleared));
    if (!hole) continue;

    cutouts.push({
      id: cleared.opening.id,
      type: cleared.opening.type,
      x: hole.x - panel.x,
      y: hole.y - panel.y,
      w: hole.width,
      h: hole.height
    });
  }

  return cutouts;
}
