/**
 * Wall rows -> canonical walls
 *
 * Accepts either canonical rows ({ id, widthIn, heightIn }) or model export
 * rows (WallId / ElementId / Id / Name, Length(ft), UnconnectedHeight(ft)).
 * Canonical fields win when both are present.
 */

import { z } from 'zod';
import { Wall } from '../algorithm/types';
import { FEET_TO_INCHES } from '../algorithm/constants';
import { Logger } from '../algorithm/utils/logger';
import { looseId, looseNumber, looseText, firstDefined, formatIssues, RowRejection } from './values';

export const WallRowSchema = z.object({
  id: looseId,
  WallId: looseId,
  ElementId: looseId,
  Id: looseId,
  Name: looseText,
  widthIn: looseNumber,
  heightIn: looseNumber,
  'Length(ft)': looseNumber,
  'UnconnectedHeight(ft)': looseNumber
});

export type WallRow = z.input<typeof WallRowSchema>;

export type WallRowResult =
  | { ok: true; wall: Wall }
  | { ok: false; reason: string };

/**
 * Normalizes one wall row. Never throws.
 */
export function normalizeWallRow(row: unknown): WallRowResult {
  const parsed = WallRowSchema.safeParse(row);
  if (!parsed.success) {
    return { ok: false, reason: formatIssues(parsed.error) };
  }

  const data = parsed.data;
  const id = firstDefined(data.id, data.WallId, data.ElementId, data.Id, data.Name) ?? 'unknown';

  const lengthFt = data['Length(ft)'];
  const heightFt = data['UnconnectedHeight(ft)'];
  const widthIn = firstDefined(data.widthIn, lengthFt === undefined ? undefined : lengthFt * FEET_TO_INCHES) ?? 0;
  const heightIn = firstDefined(data.heightIn, heightFt === undefined ? undefined : heightFt * FEET_TO_INCHES) ?? 0;

  if (!(widthIn > 0) || !(heightIn > 0)) {
    return { ok: false, reason: `wall ${id} has non-positive dimensions (${widthIn}" x ${heightIn}")` };
  }

  return { ok: true, wall: { id, widthIn, heightIn } };
}

/**
 * Normalizes a batch of wall rows, skipping (and logging) the invalid ones.
 */
export function normalizeWallRows(rows: readonly unknown[]): { walls: Wall[]; rejected: RowRejection[] } {
  const walls: Wall[] = [];
  const rejected: RowRejection[] = [];

  rows.forEach((row, index) => {
    const result = normalizeWallRow(row);
    if (result.ok) {
      walls.push(result.wall);
    } else {
      Logger.warn(`[SKIP] Wall row ${index}: ${result.reason}`);
      rejected.push({ index, reason: result.reason });
    }
  });

  Logger.info(`Loaded ${walls.length} wall(s), skipped ${rejected.length}`);
  return { walls, rejected };
}
