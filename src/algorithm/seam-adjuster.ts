/**
 * Seam Adjuster
 *
 * For small openings (man doors, ordinary windows) a seam between two panels
 * should not run through the opening. When it does, the seam moves to the
 * opening's left edge so the right-hand panel owns the whole opening.
 */

import { ClassifiedOpening, LayoutPolicy, PanelConstraints, PlacedPanel } from './types';
import { isValidPanel } from './panel-validation';
import { snapDown } from './utils/snap';
import { TOLERANCE } from './constants';
import { Logger } from './utils/logger';

export function isSmallOpening(cleared: ClassifiedOpening, policy: LayoutPolicy): boolean {
  const { w, h } = cleared.opening;
  return w < policy.smallOpeningMaxWidth && h < policy.smallOpeningMaxHeight;
}

/**
 * Moves at most one seam per small opening.
 *
 * Only neighbours in the same row qualify: same y and height, with the right
 * panel one spacing after the left one. Both panels must stay valid.
 *
 * @returns A new array, same length and order; adjusted panels are replaced
 */
export function adjustSeams(
  panels: readonly PlacedPanel[],
  openings: readonly ClassifiedOpening[],
  constraints: PanelConstraints,
  policy: LayoutPolicy
): PlacedPanel[] {
  const result = panels.map(p => ({ ...p }));
  const spacing = constraints.panelSpacing;

  for (const cleared of openings) {
    if (!isSmallOpening(cleared, policy)) continue;

    const { opening } = cleared;
    const openingRight = opening.x + opening.w;

    const crossing = result
      .map((panel, index) => ({ panel, index }))
      .filter(({ panel }) => !(panel.y + panel.h <= opening.y || panel.y >= opening.y + opening.h))
      .sort((a, b) => a.panel.y - b.panel.y || a.panel.x - b.panel.x);

    for (let i = 0; i < crossing.length - 1; i++) {
      const left = crossing[i].panel;
      const right = crossing[i + 1].panel;

      if (left.y !== right.y || left.h !== right.h) continue;

      const seam = left.x + left.w + spacing;
      if (Math.abs(right.x - seam) > TOLERANCE.adjacency) continue;
      if (!(opening.x < seam && seam < openingRight)) continue;

      const newSeam = snapDown(opening.x, constraints.dimensionIncrement);
      if (newSeam <= left.x) continue;

      const newLeftWidth = left.w - (seam - newSeam);
      const newRightWidth = right.x + right.w - newSeam;
      if (!isValidPanel(newLeftWidth, left.h, constraints) || !isValidPanel(newRightWidth, right.h, constraints)) {
        continue;
      }

      Logger.debug(`[SEAM-ADJUST] Moving seam ${seam}" -> ${newSeam}" for opening ${opening.id}`);

      result[crossing[i].index] = { ...left, w: newLeftWidth };
      result[crossing[i + 1].index] = { ...right, x: newSeam, w: newRightWidth };
      break;
    }
  }

  return result;
}
