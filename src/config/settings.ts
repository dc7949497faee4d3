/**
 * Settings Manager
 *
 * Reads ~/.quarterscope/settings.json and resolves the dataset location.
 * Validates with Zod on read. A missing file means defaults.
 */

import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { QuarterscopeSettings } from './types.js';
import { defaultDatasetPath, settingsPath } from './paths.js';

const ENV_DATASET_PATH = 'QUARTERSCOPE_DB';

export const DEFAULT_REPORT_LIMIT = 20;

// ─── Zod Schema ──────────────────────────────────────────────

const ThresholdConfigSchema = z
  .object({
    surgePercent: z.number().positive().optional(),
    declinePercent: z.number().positive().optional(),
  })
  .optional();

const SettingsSchema = z.object({
  version: z.literal(1),
  dataset: z
    .object({
      path: z.string().min(1).optional(),
    })
    .default({}),
  report: z
    .object({
      limit: z.number().int().positive().default(DEFAULT_REPORT_LIMIT),
      thresholds: ThresholdConfigSchema,
    })
    .default({}),
});

// ─── Read ────────────────────────────────────────────────────

/**
 * Read and validate settings. Returns defaults if the file doesn't exist.
 * Throws on invalid JSON or schema validation failure.
 */
export function readSettings(filePath: string = settingsPath()): QuarterscopeSettings {
  if (!existsSync(filePath)) {
    return createDefaultSettings();
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return SettingsSchema.parse(parsed);
}

export function createDefaultSettings(): QuarterscopeSettings {
  return {
    version: 1,
    dataset: {},
    report: { limit: DEFAULT_REPORT_LIMIT },
  };
}

/**
 * Resolve the dataset database path in order:
 * 1. QUARTERSCOPE_DB environment variable
 * 2. settings.dataset.path
 * 3. ~/.quarterscope/dataset.db
 */
export function resolveDatasetPath(settings: QuarterscopeSettings): string {
  const envPath = process.env[ENV_DATASET_PATH];
  if (envPath) {
    return envPath;
  }
  return settings.dataset.path ?? defaultDatasetPath();
}
