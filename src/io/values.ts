/**
 * Lenient value coercion for rows exported from building models.
 * Exports carry numbers as text, blanks as "", "nan" or "None", and ids as
 * floats ("1234.0").
 */

import { z } from 'zod';

/**
 * Blank-like values become undefined; anything else that is not a finite
 * number becomes 0.
 */
export function parseLooseNumber(value: unknown): number | undefined {
  if (value === null || value === undefined) return undefined;

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }

  if (typeof value === 'string') {
    const text = value.trim().toLowerCase();
    if (text === '' || text === 'nan' || text === 'none') return undefined;
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : 0;
  }

  return 0;
}

/**
 * Ids as text; integral floats lose their fraction ("1234.0" -> "1234").
 */
export function parseLooseId(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;

  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : undefined;
  }

  if (typeof value === 'string') {
    const text = value.trim();
    if (text === '' || text.toLowerCase() === 'nan' || text.toLowerCase() === 'none') return undefined;
    const parsed = Number(text);
    if (Number.isFinite(parsed) && Number.isInteger(parsed)) {
      return String(parsed);
    }
    return text;
  }

  return undefined;
}

export const looseNumber = z.preprocess(parseLooseNumber, z.number().optional());
export const looseId = z.preprocess(parseLooseId, z.string().optional());
export const looseText = z.preprocess(
  v => (typeof v === 'string' && v.trim() !== '' ? v.trim() : undefined),
  z.string().optional()
);

/**
 * First defined value, in priority order
 */
export function firstDefined<T>(...values: (T | undefined)[]): T | undefined {
  return values.find(v => v !== undefined);
}

/**
 * A row that could not be turned into a wall or opening
 */
export interface RowRejection {
  index: number;
  reason: string;
}

/**
 * Flattens zod issues into one line: "path: message; path: message"
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
