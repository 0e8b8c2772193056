/**
 * Wall Processor
 *
 * Runs the full layout for one wall:
 * 1. Classify openings (Blocker / Cutout)
 * 2. Split the wall into regions around Blockers
 * 3. Per region: sequential placement, gap fill around Cutouts, seam adjustment
 * 4. Fill above and below every Blocker
 * 5. Cut out Cutout zones and name panels P01..Pn in placement order
 *
 * Never throws on well-formed input; a degenerate wall yields an empty layout.
 */

import { Opening, OptimizerConfig, Panel, PlacedPanel, Wall, WallLayout } from './types';
import { classifyOpenings } from './classifier';
import { splitRegions } from './region-splitter';
import { placeRegion } from './sequential-placer';
import { fillBlockerGaps, fillCutoutGaps } from './gap-filler';
import { adjustSeams } from './seam-adjuster';
import { calculatePanelCutouts } from './cutouts';
import { Logger } from './utils/logger';

/**
 * Panel name for a 0-based placement index: P01, P02, ... P100
 */
export function panelName(index: number): string {
  return `P${String(index + 1).padStart(2, '0')}`;
}

/**
 * Lays out panels on one wall.
 */
export function processWall(
  wall: Wall,
  openings: readonly Opening[],
  config: OptimizerConfig
): WallLayout {
  const { widthIn, heightIn } = wall;
  const constraints = config.panelConstraints;

  Logger.info(`[WALL ${wall.id}] ${widthIn}" x ${heightIn}" with ${openings.length} opening(s)`);

  if (!(widthIn > 0) || !(heightIn > 0)) {
    Logger.warn(`Wall ${wall.id} has non-positive dimensions - no panels`);
    return { wallId: wall.id, widthIn, heightIn, panels: [], regions: [], blockers: [], cutouts: [] };
  }

  const sorted = [...openings].sort((a, b) => a.x - b.x);
  const { blockers, cutouts } = classifyOpenings(sorted, config);
  const regions = splitRegions(widthIn, heightIn, blockers, cutouts, constraints);

  let placed: PlacedPanel[] = [];

  for (const region of regions) {
    const start = placed.length;

    placed.push(...placeRegion(region, constraints, config.orientation));
    placed.push(...fillCutoutGaps(region, heightIn, placed, blockers, constraints));

    // Seams only move between panels of this region
    const regionIndexes: number[] = [];
    for (let i = start; i < placed.length; i++) {
      if (placed[i].x >= region.xStart && placed[i].x < region.xEnd) {
        regionIndexes.push(i);
      }
    }
    const adjusted = adjustSeams(
      regionIndexes.map(i => placed[i]),
      region.openings,
      constraints,
      config.policy
    );
    placed = placed.map((panel, i) => {
      const at = regionIndexes.indexOf(i);
      return at === -1 ? panel : adjusted[at];
    });
  }

  placed.push(...fillBlockerGaps(blockers, widthIn, heightIn, placed, constraints));

  const panels: Panel[] = placed.map((p, i) => ({
    name: panelName(i),
    x: p.x,
    y: p.y,
    w: p.w,
    h: p.h,
    cutouts: calculatePanelCutouts(p, cutouts)
  }));

  if (panels.length === 0) {
    Logger.warn(`Wall ${wall.id}: no panels generated`);
  } else {
    Logger.info(`Wall ${wall.id}: ${panels.length} panel(s) in ${regions.length} region(s)`);
  }

  return { wallId: wall.id, widthIn, heightIn, panels, regions, blockers, cutouts };
}

/**
 * Lays out every wall with its own openings.
 *
 * @param openingsByWall - Openings keyed by host wall id; walls without an entry have none
 */
export function processWalls(
  walls: readonly Wall[],
  openingsByWall: ReadonlyMap<string, readonly Opening[]>,
  config: OptimizerConfig
): WallLayout[] {
  const layouts = walls.map(wall => processWall(wall, openingsByWall.get(wall.id) ?? [], config));
  const total = layouts.reduce((sum, layout) => sum + layout.panels.length, 0);

  if (total === 0 && walls.length > 0) {
    Logger.error(`No panels generated for any of ${walls.length} wall(s)`);
  }
  return layouts;
}
