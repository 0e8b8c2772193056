/**
 * Panel Validation Tests
 */

import { isValidPanel, maxWidthForHeight, panelsOverlap } from './panel-validation';
import { DEFAULT_PANEL_CONSTRAINTS, HORIZONTAL_PRESET } from './constants';
import { PanelConstraints } from './types';

const vertical = DEFAULT_PANEL_CONSTRAINTS;
const horizontal = HORIZONTAL_PRESET.panelConstraints;

describe('isValidPanel', () => {
  it('should accept panels within the size ranges', () => {
    expect(isValidPanel(119, 108, vertical)).toBe(true);
    expect(isValidPanel(24, 24, vertical)).toBe(true);
    expect(isValidPanel(138, 348, vertical)).toBe(true);
  });

  it('should reject panels outside the size ranges', () => {
    expect(isValidPanel(23, 108, vertical)).toBe(false);
    expect(isValidPanel(139, 108, vertical)).toBe(false);
    expect(isValidPanel(100, 349, vertical)).toBe(false);
    expect(isValidPanel(200, 139, horizontal)).toBe(false);
  });

  it('should allow only one dimension over shortMax', () => {
    const square: PanelConstraints = { ...vertical, maxWidth: 348, maxHeight: 348 };

    expect(isValidPanel(200, 138, square)).toBe(true);
    expect(isValidPanel(138, 200, square)).toBe(true);
    expect(isValidPanel(200, 200, square)).toBe(false);
  });

  it('should reject non-finite sizes', () => {
    expect(isValidPanel(Number.NaN, 100, vertical)).toBe(false);
  });
});

describe('maxWidthForHeight', () => {
  it('should cap width at maxWidth for vertical panels', () => {
    expect(maxWidthForHeight(108, vertical)).toBe(138);
    expect(maxWidthForHeight(200, vertical)).toBe(138);
  });

  it('should cap width at shortMax once the height passes it', () => {
    expect(maxWidthForHeight(100, horizontal)).toBe(348);
    expect(maxWidthForHeight(139, horizontal)).toBe(138);
  });
});

describe('panelsOverlap', () => {
  it('should treat touching panels as not overlapping', () => {
    expect(panelsOverlap({ x: 0, y: 0, w: 10, h: 10 }, { x: 10, y: 0, w: 10, h: 10 })).toBe(false);
  });

  it('should detect shared area', () => {
    expect(panelsOverlap({ x: 0, y: 0, w: 10, h: 10 }, { x: 9.875, y: 5, w: 10, h: 10 })).toBe(true);
  });
});
