/**
 * Wall Panel Optimizer - Algorithm Module
 *
 * Exports all public APIs for panel layout
 */

// Types - use 'export type' for type-only exports
export { OpeningType } from './types';
export type {
  PanelConstraints,
  OpeningClearance,
  PanelOrientation,
  LayoutPolicy,
  OptimizerConfig,
  Wall,
  Opening,
  OpeningKind,
  ClassifiedOpening,
  Classification,
  Region,
  Band,
  PanelCutout,
  Panel,
  PlacedPanel,
  WallLayout
} from './types';

// Constants
export {
  FEET_TO_INCHES,
  DEFAULT_PANEL_CONSTRAINTS,
  DEFAULT_DOOR_CLEARANCES,
  DEFAULT_WINDOW_CLEARANCES,
  DEFAULT_STOREFRONT_CLEARANCES,
  DEFAULT_LAYOUT_POLICY,
  DEFAULT_PROJECT_NAME,
  VERTICAL_PRESET,
  HORIZONTAL_PRESET,
  PRESETS,
  getPresetConfig
} from './constants';

// Layout pipeline
export {
  leftClearanceZone,
  rightClearanceZone,
  bottomClearanceZone,
  topClearanceZone,
  clearanceRectangle
} from './clearance';
export type { ClearedOpening } from './clearance';
export { classifyOpening, classifyOpenings, isStorefrontLike, requiredSpan } from './classifier';
export { splitRegions } from './region-splitter';
export { computeBands, placeBand, placeRegion, validateSeam } from './sequential-placer';
export { fillGap, fillCutoutGaps, fillBlockerGaps } from './gap-filler';
export type { GapArea } from './gap-filler';
export { adjustSeams, isSmallOpening } from './seam-adjuster';
export { calculatePanelCutouts } from './cutouts';
export { calculateSegmentLayout } from './segment-layout';
export type { SegmentLayoutInput } from './segment-layout';
export { isValidPanel, maxWidthForHeight, panelsOverlap } from './panel-validation';
export { processWall, processWalls, panelName } from './wall-processor';

// Utilities
export { snapDown, snapUp } from './utils/snap';
