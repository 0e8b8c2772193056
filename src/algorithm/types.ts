/**
 * Wall Panel Optimizer - Algorithm Types
 * Types for the panel layout algorithm
 *
 * ## Opening lifecycle
 *
 * An `Opening` is immutable and carries the clearance of its category
 * (door / window / storefront). Classification never mutates it: the
 * classifier returns a `ClassifiedOpening`, a tagged copy carrying the
 * *effective* clearance for this run. Re-running a wall therefore always
 * starts from the same inputs.
 *
 * All lengths are in inches, wall-local: x from the wall start, y from the
 * wall base, rectangles anchored at their bottom-left corner.
 */

// ============================================================================
// CONSTRAINTS & CONFIGURATION
// ============================================================================

/**
 * Fabrication limits for a single panel.
 *
 * Invariants (enforced by `parseOptimizerConfig`):
 * minWidth < maxWidth <= longMax, shortMax <= longMax, minHeight < maxHeight
 */
export interface PanelConstraints {
  minWidth: number;
  maxWidth: number;
  minHeight: number;
  maxHeight: number;
  shortMax: number;            // A panel may exceed this in at most one dimension
  longMax: number;             // Absolute cap in either dimension
  dimensionIncrement: number;  // Panel sizes snap to multiples of this
  panelSpacing: number;        // Gap between neighbouring panels (seam width)
}

/**
 * Minimum keep-out margins around an opening.
 */
export interface OpeningClearance {
  jambMin: number;    // Left and right
  headerMin: number;  // Above
  sillMin: number;    // Below
}

export type PanelOrientation = 'vertical' | 'horizontal';

/**
 * Heuristic thresholds that shape the layout.
 * Kept as data so callers can tune them per project.
 */
export interface LayoutPolicy {
  /** Openings narrower than this (and shorter than the height limit) get seam adjustment */
  smallOpeningMaxWidth: number;
  smallOpeningMaxHeight: number;
  /** Storefronts / curtain walls are always Blockers when true, otherwise span-tested */
  storefrontAlwaysBlocks: boolean;
}

/**
 * Complete optimizer configuration, passed explicitly to every call.
 */
export interface OptimizerConfig {
  projectName: string;
  panelConstraints: PanelConstraints;
  doorClearances: OpeningClearance;
  windowClearances: OpeningClearance;
  storefrontClearances: OpeningClearance;
  orientation: PanelOrientation;
  policy: LayoutPolicy;
}

// ============================================================================
// WALLS & OPENINGS
// ============================================================================

export enum OpeningType {
  Door = 'Door',
  Window = 'Window',
  Storefront = 'Storefront/Curtain',
  Unknown = 'Unknown'
}

/**
 * A wall face reduced to what the layout needs.
 */
export interface Wall {
  id: string;
  widthIn: number;
  heightIn: number;
}

/**
 * An opening on a wall face. Immutable once created.
 */
export interface Opening {
  readonly id: string;
  readonly type: OpeningType;
  readonly x: number;   // Left edge from wall start
  readonly y: number;   // Sill height from wall base
  readonly w: number;
  readonly h: number;
  /** Category clearance, before classification */
  readonly clearance: Readonly<OpeningClearance>;
}

export type OpeningKind = 'cutout' | 'blocker';

/**
 * Result of classifying one opening.
 * - `cutout`: covered by a panel and punched out of it
 * - `blocker`: excluded from panels entirely; splits the wall into regions
 */
export interface ClassifiedOpening {
  readonly kind: OpeningKind;
  readonly opening: Opening;
  /** Effective clearance for this run */
  readonly clearance: Readonly<OpeningClearance>;
}

export interface Classification {
  blockers: ClassifiedOpening[];
  cutouts: ClassifiedOpening[];
}

// ============================================================================
// LAYOUT
// ============================================================================

/**
 * A horizontal slice of the wall between Blockers.
 */
export interface Region {
  xStart: number;
  xEnd: number;
  yStart: number;
  yEnd: number;
  /** Cutout openings intersecting this region horizontally */
  openings: ClassifiedOpening[];
}

/**
 * A horizontal strip of a region filled by one pass of the placer.
 */
export interface Band {
  yStart: number;
  yEnd: number;
}

/**
 * Hole in a panel, in panel-local coordinates (panel bottom-left = 0,0).
 */
export interface PanelCutout {
  id: string;
  type: OpeningType;
  x: number;
  y: number;
  w: number;
  h: number;
}

export interface Panel {
  readonly name: string;
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
  readonly cutouts: readonly PanelCutout[];
}

/**
 * Panel geometry before naming and cutout calculation.
 */
export interface PlacedPanel {
  x: number;
  y: number;
  w: number;
  h: number;
}

/**
 * Per-wall layout result.
 */
export interface WallLayout {
  wallId: string;
  widthIn: number;
  heightIn: number;
  panels: Panel[];
  regions: Region[];
  blockers: ClassifiedOpening[];
  cutouts: ClassifiedOpening[];
}
