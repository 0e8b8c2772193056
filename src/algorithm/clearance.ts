/**
 * Clearance Model
 *
 * Keep-out rectangle around an opening, derived from its effective clearance.
 * Left and bottom edges are clamped to the wall origin; right and top edges are
 * NOT clamped to the wall extent, so an opening near the far end or the top of
 * a wall can project its zone past the wall.
 */

import { ClassifiedOpening, Opening, OpeningClearance } from './types';
import { Rectangle } from '../types/geometry';
import { createRectangle } from '../geometry/rectangle';

/**
 * Anything that has opening geometry and a clearance to apply to it.
 */
export interface ClearedOpening {
  opening: Opening;
  clearance: Readonly<OpeningClearance>;
}

export function leftClearanceZone({ opening, clearance }: ClearedOpening): number {
  return Math.max(0, opening.x - clearance.jambMin);
}

export function rightClearanceZone({ opening, clearance }: ClearedOpening): number {
  return opening.x + opening.w + clearance.jambMin;
}

export function bottomClearanceZone({ opening, clearance }: ClearedOpening): number {
  return Math.max(0, opening.y - clearance.sillMin);
}

export function topClearanceZone({ opening, clearance }: ClearedOpening): number {
  return opening.y + opening.h + clearance.headerMin;
}

/**
 * Full clearance rectangle of an opening
 */
export function clearanceRectangle(cleared: ClearedOpening): Rectangle {
  const left = leftClearanceZone(cleared);
  const bottom = bottomClearanceZone(cleared);
  return createRectangle(left, bottom, rightClearanceZone(cleared) - left, topClearanceZone(cleared) - bottom);
}

/**
 * Does the opening's zone overlap the vertical span [yStart, yEnd]?
 */
export function intersectsBand(cleared: ClassifiedOpening, yStart: number, yEnd: number): boolean {
  return !(topClearanceZone(cleared) <= yStart || bottomClearanceZone(cleared) >= yEnd);
}
