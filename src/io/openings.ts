/**
 * Opening rows -> canonical openings
 *
 * Accepts canonical rows ({ id, hostWallId, type, x, y, w, h } in inches) or
 * model export rows (OpeningId, HostWallId, OpeningType, Width(ft), Height(ft),
 * SillHeight(ft), LeftEdgeAlongWall(ft) or PositionAlongWall(ft)).
 */

import { z } from 'zod';
import { Opening, OpeningClearance, OpeningType, OptimizerConfig } from '../algorithm/types';
import { FEET_TO_INCHES } from '../algorithm/constants';
import { Logger } from '../algorithm/utils/logger';
import { looseId, looseNumber, looseText, firstDefined, formatIssues, RowRejection } from './values';

export const OpeningRowSchema = z.object({
  id: looseId,
  OpeningId: looseId,
  hostWallId: looseId,
  HostWallId: looseId,
  type: looseText,
  OpeningType: looseText,
  x: looseNumber,
  y: looseNumber,
  w: looseNumber,
  h: looseNumber,
  'Width(ft)': looseNumber,
  'Height(ft)': looseNumber,
  'SillHeight(ft)': looseNumber,
  'LeftEdgeAlongWall(ft)': looseNumber,
  'PositionAlongWall(ft)': looseNumber
});

export type OpeningRow = z.input<typeof OpeningRowSchema>;

/**
 * An opening together with the wall it sits on
 */
export interface HostedOpening {
  hostWallId: string | undefined;
  opening: Opening;
}

export type OpeningRowResult =
  | { ok: true; hosted: HostedOpening }
  | { ok: false; reason: string };

/**
 * Maps free-text type names onto opening categories.
 * "Storefront", "Curtain Wall" and "Storefront/Curtain" are all storefronts.
 */
export function parseOpeningType(text: string | undefined): OpeningType {
  const lower = (text ?? '').toLowerCase();
  if (lower.includes('door')) return OpeningType.Door;
  if (lower.includes('storefront') || lower.includes('curtain')) return OpeningType.Storefront;
  if (lower.includes('window')) return OpeningType.Window;
  return OpeningType.Unknown;
}

/**
 * Category clearance for an opening type; unknown openings are treated as windows
 */
export function clearanceForType(type: OpeningType, config: OptimizerConfig): OpeningClearance {
  switch (type) {
    case OpeningType.Door:
      return { ...config.doorClearances };
    case OpeningType.Storefront:
      return { ...config.storefrontClearances };
    case OpeningType.Window:
    case OpeningType.Unknown:
      return { ...config.windowClearances };
  }
}

/**
 * Builds an immutable opening with its category clearance
 */
export function createOpening(
  input: { id: string; type: OpeningType; x: number; y: number; w: number; h: number },
  config: OptimizerConfig
): Opening {
  return Object.freeze({
    ...input,
    clearance: Object.freeze(clearanceForType(input.type, config))
  });
}

function feetToInches(feet: number | undefined): number | undefined {
  return feet === undefined ? undefined : feet * FEET_TO_INCHES;
}

/**
 * Normalizes one opening row. Never throws.
 */
export function normalizeOpeningRow(row: unknown, config: OptimizerConfig): OpeningRowResult {
  const parsed = OpeningRowSchema.safeParse(row);
  if (!parsed.success) {
    return { ok: false, reason: formatIssues(parsed.error) };
  }

  const data = parsed.data;
  const id = firstDefined(data.id, data.OpeningId) ?? '';
  const w = firstDefined(data.w, feetToInches(data['Width(ft)'])) ?? 0;
  const h = firstDefined(data.h, feetToInches(data['Height(ft)'])) ?? 0;

  if (!(w > 0) || !(h > 0)) {
    return { ok: false, reason: `opening ${id || '(no id)'} has non-positive size (${w}" x ${h}")` };
  }

  let x = data.x;
  if (x === undefined) {
    const leftFt = data['LeftEdgeAlongWall(ft)'] ?? 0;
    const centerFt = data['PositionAlongWall(ft)'];
    // Older exports only carry the centre of the opening
    x = leftFt === 0 && centerFt !== undefined && centerFt !== 0
      ? centerFt * FEET_TO_INCHES - w / 2
      : leftFt * FEET_TO_INCHES;
  }
  const y = firstDefined(data.y, feetToInches(data['SillHeight(ft)'])) ?? 0;
  const type = parseOpeningType(firstDefined(data.type, data.OpeningType));

  return {
    ok: true,
    hosted: {
      hostWallId: firstDefined(data.hostWallId, data.HostWallId),
      opening: createOpening({ id, type, x, y, w, h }, config)
    }
  };
}

/**
 * Normalizes a batch of opening rows, skipping (and logging) the invalid ones.
 */
export function normalizeOpeningRows(
  rows: readonly unknown[],
  config: OptimizerConfig
): { openings: HostedOpening[]; rejected: RowRejection[] } {
  const openings: HostedOpening[] = [];
  const rejected: RowRejection[] = [];

  rows.forEach((row, index) => {
    const result = normalizeOpeningRow(row, config);
    if (result.ok) {
      openings.push(result.hosted);
    } else {
      Logger.warn(`[SKIP] Opening row ${index}: ${result.reason}`);
      rejected.push({ index, reason: result.reason });
    }
  });

  Logger.info(`Loaded ${openings.length} opening(s), skipped ${rejected.length}`);
  return { openings, rejected };
}

/**
 * Groups openings by host wall. Openings without a host are dropped.
 */
export function groupOpeningsByWall(openings: readonly HostedOpening[]): Map<string, Opening[]> {
  const byWall = new Map<string, Opening[]>();
  for (const { hostWallId, opening } of openings) {
    if (hostWallId === undefined) {
      Logger.debug(`Opening ${opening.id} has no host wall - ignored`);
      continue;
    }
    const list = byWall.get(hostWallId) ?? [];
    list.push(opening);
    byWall.set(hostWallId, list);
  }
  return byWall;
}
