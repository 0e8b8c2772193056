/**
 * Seam Adjuster Tests
 */

import { adjustSeams, isSmallOpening } from './seam-adjuster';
import { classifyOpening } from './classifier';
import { verticalConfig } from '../../test/fixtures/configs';
import { door } from '../../test/fixtures/walls';

describe('isSmallOpening', () => {
  const config = verticalConfig();

  it('should accept man doors', () => {
    expect(isSmallOpening(classifyOpening(door(config), config), config.policy)).toBe(true);
  });

  it('should reject openings at the size limits', () => {
    expect(isSmallOpening(classifyOpening(door(config, 100, 72), config), config.policy)).toBe(false);
    expect(isSmallOpening(classifyOpening(door(config, 100, 36, 120), config), config.policy)).toBe(false);
  });
});

describe('adjustSeams', () => {
  const config = verticalConfig();
  const c = config.panelConstraints;

  it('should move a seam through a door to the door edge', () => {
    const panels = [
      { x: 0, y: 0, w: 110, h: 108 },
      { x: 110.125, y: 0, w: 100, h: 108 }
    ];
    const openings = [classifyOpening(door(config), config)];

    expect(adjustSeams(panels, openings, c, config.policy)).toEqual([
      { x: 0, y: 0, w: 99.875, h: 108 },
      { x: 100, y: 0, w: 110.125, h: 108 }
    ]);
    expect(panels[0].w).toBe(110);
  });

  it('should leave the seam when the left panel would become too narrow', () => {
    const panels = [
      { x: 0, y: 0, w: 30, h: 108 },
      { x: 30.125, y: 0, w: 100, h: 108 }
    ];
    const openings = [classifyOpening(door(config, 20), config)];

    expect(adjustSeams(panels, openings, c, config.policy)).toEqual(panels);
  });

  it('should ignore large openings', () => {
    const panels = [
      { x: 0, y: 0, w: 110, h: 108 },
      { x: 110.125, y: 0, w: 100, h: 108 }
    ];
    const openings = [classifyOpening(door(config, 100, 80), config)];

    expect(adjustSeams(panels, openings, c, config.policy)).toEqual(panels);
  });

  it('should only pair panels in the same row', () => {
    const panels = [
      { x: 0, y: 0, w: 110, h: 50 },
      { x: 110.125, y: 0, w: 100, h: 60 }
    ];
    const openings = [classifyOpening(door(config), config)];

    expect(adjustSeams(panels, openings, c, config.policy)).toEqual(panels);
  });
});
