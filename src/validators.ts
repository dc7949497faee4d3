/**
 * Zod schemas for validating report arguments passed by MCP clients and the CLI.
 *
 * Point shapes are checked here; the quarter domain and key uniqueness are
 * left to analyzePeriodGrowth so its own errors reach the caller.
 */

import { z, ZodError } from 'zod';
import { GROWTH_MEASURES, GROWTH_SOURCES } from './types/dataset.js';

const NameListSchema = z.array(z.string().min(1)).optional();

const LimitSchema = z.number().int().positive().optional();

export const MetricPointSchema = z.object({
  entityKey: z.string().min(1),
  year: z.number().int(),
  quarter: z.number(),
  value: z.number().finite(),
});

export const GrowthArgsSchema = z.object({
  source: z.enum(GROWTH_SOURCES).default('transactions'),
  measure: z.enum(GROWTH_MEASURES).default('count'),
  states: NameListSchema,
  limit: LimitSchema,
});

export const GrowthFromPointsArgsSchema = z.object({
  points: z.array(MetricPointSchema),
  entityLabel: z.string().min(1).optional(),
  limit: LimitSchema,
});

export const StateFilterArgsSchema = z.object({
  states: NameListSchema,
});

export const CategoryArgsSchema = z.object({
  states: NameListSchema,
  categories: NameListSchema,
});

/**
 * One-line message for an error surfaced to a user. Zod issues are listed
 * as "path: message" so a bad flag or tool argument is easy to spot.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join('; ');
  }
  return error instanceof Error ? error.message : 'Unknown error';
}
