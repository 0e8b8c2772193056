/**
 * Cutout Calculator Tests
 */

import { calculatePanelCutouts } from './cutouts';
import { classifyOpening } from './classifier';
import { OpeningType } from './types';
import { verticalConfig } from '../../test/fixtures/configs';
import { door, storefront } from '../../test/fixtures/walls';

describe('calculatePanelCutouts', () => {
  const config = verticalConfig();

  it('should cut the clearance zone in panel-local coordinates', () => {
    const openings = [classifyOpening(door(config), config)];

    expect(calculatePanelCutouts({ x: 94.125, y: 0, w: 48, h: 108 }, openings)).toEqual([
      { id: 'D1', type: OpeningType.Door, x: 0, y: 0, w: 47.875, h: 92 }
    ]);
  });

  it('should ignore a zone that only touches the panel', () => {
    const openings = [classifyOpening(door(config), config)];

    expect(calculatePanelCutouts({ x: 0, y: 0, w: 94, h: 108 }, openings)).toEqual([]);
  });

  it('should never cut blockers', () => {
    const openings = [classifyOpening(storefront(config), config)];

    expect(calculatePanelCutouts({ x: 0, y: 0, w: 100, h: 108 }, openings)).toEqual([]);
  });
});
