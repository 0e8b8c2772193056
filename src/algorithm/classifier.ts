/**
 * Opening Classifier
 *
 * Labels every opening on a wall as a Cutout (a panel covers it and a hole is
 * cut) or a Blocker (no panel may cover it; the wall is split around it).
 *
 * Pure: the result depends only on the opening and the configuration, so
 * classifying the same openings twice always gives the same answer.
 */

import {
  ClassifiedOpening,
  Classification,
  Opening,
  OpeningClearance,
  OpeningType,
  OptimizerConfig
} from './types';
import { Logger } from './utils/logger';

/**
 * Storefronts and curtain walls
 */
export function isStorefrontLike(opening: Opening): boolean {
  return opening.type === OpeningType.Storefront;
}

/**
 * Blockers keep only a technical gap around them, one panel spacing wide
 */
function blockerClearance(spacing: number): OpeningClearance {
  return { jambMin: spacing, headerMin: spacing, sillMin: spacing };
}

/**
 * Horizontal span one panel needs to cover the opening and both jambs
 */
export function requiredSpan(opening: Opening): number {
  return opening.w + 2 * opening.clearance.jambMin;
}

/**
 * Classifies a single opening.
 */
export function classifyOpening(opening: Opening, config: OptimizerConfig): ClassifiedOpening {
  const { panelConstraints, policy } = config;

  if (isStorefrontLike(opening) && policy.storefrontAlwaysBlocks) {
    return {
      kind: 'blocker',
      opening,
      clearance: blockerClearance(panelConstraints.panelSpacing)
    };
  }

  const span = requiredSpan(opening);
  if (span <= panelConstraints.maxWidth) {
    return { kind: 'cutout', opening, clearance: { ...opening.clearance } };
  }

  Logger.debug(
    `Opening ${opening.id} needs ${span}" > max panel width ${panelConstraints.maxWidth}" - blocker`
  );
  return {
    kind: 'blocker',
    opening,
    clearance: blockerClearance(panelConstraints.panelSpacing)
  };
}

/**
 * Splits a wall's openings into Blockers and Cutouts, preserving input order.
 */
export function classifyOpenings(openings: readonly Opening[], config: OptimizerConfig): Classification {
  const blockers: ClassifiedOpening[] = [];
  const cutouts: ClassifiedOpening[] = [];

  for (const opening of openings) {
    const classified = classifyOpening(opening, config);
    if (classified.kind === 'blocker') {
      blockers.push(classified);
    } else {
      cutouts.push(classified);
    }
  }

  return { blockers, cutouts };
}
