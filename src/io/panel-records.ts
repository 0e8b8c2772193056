/**
 * Flat, one-row-per-panel export of wall layouts (schedules, spreadsheets)
 */

import { WallLayout } from '../algorithm/types';

export interface PanelRecord {
  panelName: string;
  panelType: string;    // "WxH" in inches
  wallId: string;
  xIn: number;
  yIn: number;
  widthIn: number;
  heightIn: number;
  areaIn2: number;
  cutoutsJson: string;  // JSON array of panel-local cutouts
}

export function toPanelRecords(layout: WallLayout): PanelRecord[] {
  return layout.panels.map(panel => ({
    panelName: panel.name,
    panelType: `${panel.w}x${panel.h}`,
    wallId: layout.wallId,
    xIn: panel.x,
    yIn: panel.y,
    widthIn: panel.w,
    heightIn: panel.h,
    areaIn2: panel.w * panel.h,
    cutoutsJson: JSON.stringify(panel.cutouts)
  }));
}

/**
 * Records for several walls, in wall order
 */
export function toPanelRecordsForWalls(layouts: readonly WallLayout[]): PanelRecord[] {
  return layouts.flatMap(toPanelRecords);
}
