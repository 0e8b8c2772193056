/**
 * Optimizer configuration boundary
 *
 * Turns a loosely-shaped object (a project JSON file, UI form state) into a
 * complete `OptimizerConfig`. Missing fields take the defaults from
 * `constants.ts`; keys may be camelCase or snake_case.
 */

import { z } from 'zod';
import { OptimizerConfig, OpeningClearance } from '../algorithm/types';
import {
  DEFAULT_PANEL_CONSTRAINTS,
  DEFAULT_DOOR_CLEARANCES,
  DEFAULT_WINDOW_CLEARANCES,
  DEFAULT_STOREFRONT_CLEARANCES,
  DEFAULT_LAYOUT_POLICY,
  DEFAULT_PROJECT_NAME
} from '../algorithm/constants';
import { formatIssues } from './values';

/**
 * Thrown when a configuration object cannot be used.
 */
export class ConfigValidationError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(error: z.ZodError) {
    super(`Invalid optimizer configuration: ${formatIssues(error)}`);
    this.name = 'ConfigValidationError';
    this.issues = error.issues;
  }
}

function toCamelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively renames snake_case keys; camelCase keys win on collision.
 */
export function camelizeKeys(value: unknown): unknown {
  if (!isPlainObject(value)) return value;

  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    const camel = toCamelCase(key);
    if (camel !== key && camel in value) continue;
    result[camel] = camelizeKeys(inner);
  }
  return result;
}

const PanelConstraintsSchema = z
  .object({
    minWidth: z.number().positive().default(DEFAULT_PANEL_CONSTRAINTS.minWidth),
    maxWidth: z.number().positive().default(DEFAULT_PANEL_CONSTRAINTS.maxWidth),
    minHeight: z.number().positive().default(DEFAULT_PANEL_CONSTRAINTS.minHeight),
    maxHeight: z.number().positive().default(DEFAULT_PANEL_CONSTRAINTS.maxHeight),
    shortMax: z.number().positive().default(DEFAULT_PANEL_CONSTRAINTS.shortMax),
    longMax: z.number().positive().default(DEFAULT_PANEL_CONSTRAINTS.longMax),
    dimensionIncrement: z.number().positive().default(DEFAULT_PANEL_CONSTRAINTS.dimensionIncrement),
    panelSpacing: z.number().nonnegative().default(DEFAULT_PANEL_CONSTRAINTS.panelSpacing)
  })
  .superRefine((c, ctx) => {
    if (c.minWidth >= c.maxWidth) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['minWidth'], message: 'must be less than maxWidth' });
    }
    if (c.maxWidth > c.longMax) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maxWidth'], message: 'must not exceed longMax' });
    }
    if (c.shortMax > c.longMax) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['shortMax'], message: 'must not exceed longMax' });
    }
    if (c.minHeight >= c.maxHeight) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['minHeight'], message: 'must be less than maxHeight' });
    }
  });

function clearanceSchema(defaults: OpeningClearance) {
  return z
    .object({
      jambMin: z.number().nonnegative().default(defaults.jambMin),
      headerMin: z.number().nonnegative().default(defaults.headerMin),
      sillMin: z.number().nonnegative().default(defaults.sillMin)
    })
    .default({});
}

export const OptimizerConfigSchema = z.object({
  projectName: z.string().min(1).default(DEFAULT_PROJECT_NAME),
  panelConstraints: PanelConstraintsSchema.default({}),
  doorClearances: clearanceSchema(DEFAULT_DOOR_CLEARANCES),
  windowClearances: clearanceSchema(DEFAULT_WINDOW_CLEARANCES),
  storefrontClearances: clearanceSchema(DEFAULT_STOREFRONT_CLEARANCES),
  orientation: z.enum(['vertical', 'horizontal']).default('vertical'),
  policy: z
    .object({
      smallOpeningMaxWidth: z.number().positive().default(DEFAULT_LAYOUT_POLICY.smallOpeningMaxWidth),
      smallOpeningMaxHeight: z.number().positive().default(DEFAULT_LAYOUT_POLICY.smallOpeningMaxHeight),
      storefrontAlwaysBlocks: z.boolean().default(DEFAULT_LAYOUT_POLICY.storefrontAlwaysBlocks)
    })
    .default({})
});

/**
 * Validates a configuration object and fills in defaults.
 *
 * @throws ConfigValidationError listing every problem found
 */
export function parseOptimizerConfig(input: unknown = {}): OptimizerConfig {
  const result = OptimizerConfigSchema.safeParse(camelizeKeys(input ?? {}));
  if (!result.success) {
    throw new ConfigValidationError(result.error);
  }
  return result.data;
}

function formatClearance(c: OpeningClearance): string {
  return `jamb ${c.jambMin}", header ${c.headerMin}", sill ${c.sillMin}"`;
}

/**
 * Human-readable, multi-line summary of a configuration
 */
export function formatConfigSummary(config: OptimizerConfig): string {
  const c = config.panelConstraints;
  return [
    `Project: ${config.projectName}`,
    `Orientation: ${config.orientation}`,
    `Panel width: ${c.minWidth}" - ${c.maxWidth}"`,
    `Panel height: ${c.minHeight}" - ${c.maxHeight}"`,
    `Aspect limits: short ${c.shortMax}", long ${c.longMax}"`,
    `Increment: ${c.dimensionIncrement}", spacing: ${c.panelSpacing}"`,
    `Door clearance: ${formatClearance(config.doorClearances)}`,
    `Window clearance: ${formatClearance(config.windowClearances)}`,
    `Storefront clearance: ${formatClearance(config.storefrontClearances)}`,
    `Small opening: < ${config.policy.smallOpeningMaxWidth}" W x < ${config.policy.smallOpeningMaxHeight}" H`,
    `Storefronts always block: ${config.policy.storefrontAlwaysBlocks ? 'yes' : 'no'}`
  ].join('\n');
}
