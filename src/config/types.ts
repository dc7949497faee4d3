/**
 * Configuration Types
 *
 * Shape of ~/.quarterscope/settings.json. The Zod schema in settings.ts
 * validates against these.
 */

import type { ThresholdConfig } from './thresholds.js';

/** Where the dataset database lives. */
export interface DatasetConfig {
  path?: string;
}

/** Report rendering settings. */
export interface ReportSettings {
  /** Maximum rows per growth table. */
  limit: number;
  thresholds?: ThresholdConfig;
}

/** Root settings — stored in ~/.quarterscope/settings.json */
export interface QuarterscopeSettings {
  version: 1;
  dataset: DatasetConfig;
  report: ReportSettings;
}
