/**
 * Wall Panel Optimizer - Constants
 * Default values and configuration presets
 *
 * ALL VALUES ARE IN INCHES
 */

import {
  PanelConstraints,
  OpeningClearance,
  LayoutPolicy,
  OptimizerConfig,
  PanelOrientation
} from './types';

// Conversion factor for model exports, which report lengths in feet
export const FEET_TO_INCHES = 12;

// ============================================================================
// NUMERIC TOLERANCES
// ============================================================================

export const TOLERANCE = {
  // Absorbs float noise when snapping (e.g. 0.1 + 0.2)
  snapEpsilon: 1e-9,
  // An opening counts as "ahead" of the cursor only past this margin
  lookahead: 0.01,
  // A seam must land this far inside a clearance zone to need fixing
  seamInset: 0.1,
  // Panels closer than this (beyond the spacing) are considered adjacent
  adjacency: 1.0
};

// Segment search gives up after this many panel counts
export const MAX_SEGMENT_ITERATIONS = 100;

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_PANEL_CONSTRAINTS: PanelConstraints = {
  minWidth: 24,
  maxWidth: 138,
  minHeight: 24,
  maxHeight: 348,
  shortMax: 138,
  longMax: 348,
  dimensionIncrement: 1,
  panelSpacing: 0.125   // 1/8"
};

export const DEFAULT_DOOR_CLEARANCES: OpeningClearance = { jambMin: 6, headerMin: 8, sillMin: 6 };
export const DEFAULT_WINDOW_CLEARANCES: OpeningClearance = { jambMin: 6, headerMin: 8, sillMin: 6 };
export const DEFAULT_STOREFRONT_CLEARANCES: OpeningClearance = { jambMin: 0.75, headerMin: 0.75, sillMin: 0.75 };

/**
 * Small-opening thresholds: man doors and typical windows (< 6' wide, < 10' high)
 */
export const DEFAULT_LAYOUT_POLICY: LayoutPolicy = {
  smallOpeningMaxWidth: 72,
  smallOpeningMaxHeight: 120,
  storefrontAlwaysBlocks: true
};

export const DEFAULT_PROJECT_NAME = 'Default Project';

// ============================================================================
// PRESETS
// ============================================================================

/**
 * Vertical preset - tall, narrow, full-height panels
 */
export const VERTICAL_PRESET: OptimizerConfig = {
  projectName: 'Vertical Panels',
  panelConstraints: {
    minWidth: 24,
    maxWidth: 138,       // narrow side (shortMax)
    minHeight: 24,
    maxHeight: 348,      // tall side (longMax)
    shortMax: 138,
    longMax: 348,
    dimensionIncrement: 1,
    panelSpacing: 0.125
  },
  doorClearances: { jambMin: 6, headerMin: 8, sillMin: 6 },
  windowClearances: { jambMin: 4, headerMin: 6, sillMin: 4 },
  storefrontClearances: { ...DEFAULT_STOREFRONT_CLEARANCES },
  orientation: 'vertical',
  policy: { ...DEFAULT_LAYOUT_POLICY }
};

/**
 * Horizontal preset - wide bands, targeting ~348 x 138 panels
 */
export const HORIZONTAL_PRESET: OptimizerConfig = {
  projectName: 'Horizontal Panels',
  panelConstraints: {
    minWidth: 12,
    maxWidth: 348,       // wide side (longMax)
    minHeight: 12,
    maxHeight: 138,      // band height capped at shortMax
    shortMax: 138,
    longMax: 348,
    dimensionIncrement: 1,
    panelSpacing: 0.125
  },
  doorClearances: { jambMin: 6, headerMin: 8, sillMin: 6 },
  windowClearances: { jambMin: 6, headerMin: 8, sillMin: 6 },
  storefrontClearances: { ...DEFAULT_STOREFRONT_CLEARANCES },
  orientation: 'horizontal',
  policy: { ...DEFAULT_LAYOUT_POLICY }
};

export const PRESETS: Record<PanelOrientation, OptimizerConfig> = {
  vertical: VERTICAL_PRESET,
  horizontal: HORIZONTAL_PRESET
};

/**
 * Returns a deep copy of a preset so callers can tweak it freely
 */
export function getPresetConfig(orientation: PanelOrientation): OptimizerConfig {
  const preset = PRESETS[orientation];
  return {
    ...preset,
    panelConstraints: { ...preset.panelConstraints },
    doorClearances: { ...preset.doorClearances },
    windowClearances: { ...preset.windowClearances },
    storefrontClearances: { ...preset.storefrontClearances },
    policy: { ...preset.policy }
  };
}
