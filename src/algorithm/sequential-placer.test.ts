/**
 * Sequential Placer Tests
 */

import { computeBands, placeRegion, validateSeam } from './sequential-placer';
import { classifyOpening } from './classifier';
import { Region } from './types';
import { DEFAULT_PANEL_CONSTRAINTS, HORIZONTAL_PRESET } from './constants';
import { verticalConfig, configWithConstraints } from '../../test/fixtures/configs';
import { door, windowAt } from '../../test/fixtures/walls';

function region(xEnd: number, yEnd: number, openings: Region['openings'] = []): Region {
  return { xStart: 0, xEnd, yStart: 0, yEnd, openings };
}

describe('computeBands', () => {
  it('should use one full-height band for vertical panels', () => {
    expect(computeBands(region(240, 108), DEFAULT_PANEL_CONSTRAINTS, 'vertical')).toEqual([
      { yStart: 0, yEnd: 108 }
    ]);
  });

  it('should stack maxHeight bands when the region is taller', () => {
    expect(computeBands(region(240, 400), DEFAULT_PANEL_CONSTRAINTS, 'vertical')).toEqual([
      { yStart: 0, yEnd: 348 },
      { yStart: 348.125, yEnd: 399.125 }
    ]);
  });

  it('should stack shortMax strips for horizontal panels', () => {
    expect(computeBands(region(480, 300), HORIZONTAL_PRESET.panelConstraints, 'horizontal')).toEqual([
      { yStart: 0, yEnd: 138 },
      { yStart: 138.125, yEnd: 276.125 },
      { yStart: 276.25, yEnd: 299.25 }
    ]);
  });
});

describe('validateSeam', () => {
  const config = verticalConfig();
  const openings = [classifyOpening(door(config), config)];
  const c = config.panelConstraints;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
  });

  it('should keep a seam outside every zone', () => {
    expect(validateSeam(0, 50, openings, 138, 240, c)).toBe(50);
  });

  it('should snap back to the left jamb when the panel stays wide enough', () => {
    expect(validateSeam(0, 120, openings, 138, 240, c)).toBe(94);
  });

  it('should extend past the right jamb otherwise', () => {
    expect(validateSeam(80, 40, openings, 138, 240, c)).toBe(62);
  });

  it('should clamp to max width when neither fix fits', () => {
    expect(validateSeam(80, 40, openings, 50, 240, c)).toBe(50);
    expect(warn).toHaveBeenCalledWith('[WARN] Cannot clear opening D1 (needs 62", max 50") - clamped to 50"');
  });
});

describe('placeRegion', () => {
  it('should split an open wall into two even panels', () => {
    const panels = placeRegion(region(240, 108), DEFAULT_PANEL_CONSTRAINTS, 'vertical');

    expect(panels).toEqual([
      { x: 0, y: 0, w: 119, h: 108 },
      { x: 119.125, y: 0, w: 120, h: 108 }
    ]);
  });

  it('should stop at a door and bridge it with one panel', () => {
    const config = verticalConfig();
    const openings = [classifyOpening(door(config), config)];

    const panels = placeRegion(region(240, 108, openings), config.panelConstraints, 'vertical');

    expect(panels).toEqual([
      { x: 0, y: 0, w: 94, h: 108 },
      { x: 94.125, y: 0, w: 48, h: 108 },
      { x: 142.25, y: 0, w: 97, h: 108 }
    ]);
  });

  it('should hop past an opening too wide for the band', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    // 200" tall bands are limited to shortMax (138") wide
    const config = configWithConstraints({ maxWidth: 200 });
    const openings = [classifyOpening(windowAt(config, 100, 50, 150, 60), config)];

    const panels = placeRegion(region(400, 200, openings), config.panelConstraints, 'vertical');

    expect(panels).toEqual([
      { x: 0, y: 0, w: 96, h: 200 },
      { x: 254, y: 0, w: 72, h: 200 },
      { x: 326.125, y: 0, w: 73, h: 200 }
    ]);
    expect(warn).toHaveBeenCalledWith(
      '[WARN] Cannot bridge opening WN1 from 96.125" (max 138") - hopping past it'
    );
    warn.mockRestore();
  });

  it('should hop instead of bridging less than min width', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const config = verticalConfig();
    // Region starts inside the door's 44"-92" zone, 22" short of its end
    const openings = [classifyOpening(door(config, 50), config)];
    const inside: Region = { xStart: 70, xEnd: 240, yStart: 0, yEnd: 108, openings };

    expect(placeRegion(inside, config.panelConstraints, 'vertical')).toEqual([
      { x: 92, y: 0, w: 73, h: 108 },
      { x: 165.125, y: 0, w: 74, h: 108 }
    ]);
    expect(warn).toHaveBeenCalledWith('[WARN] Cannot bridge opening D1 from 70" (max 138") - hopping past it');
    warn.mockRestore();
  });

  it('should place nothing in a region narrower than one panel', () => {
    expect(placeRegion(region(20, 108), DEFAULT_PANEL_CONSTRAINTS, 'vertical')).toEqual([]);
  });
});
