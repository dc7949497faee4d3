/**
 * Highlight Thresholds
 *
 * Percent-growth levels at which a growth record is called out in reports.
 * Users can override any subset via settings.json report.thresholds.
 * Missing overrides fall back to defaults.
 */

export interface ThresholdConfig {
  /** Growth at or above this percentage is a surge. */
  surgePercent?: number;
  /** Growth at or below the negative of this percentage is a decline. */
  declinePercent?: number;
}

export const DEFAULT_THRESHOLDS: Required<ThresholdConfig> = {
  surgePercent: 50,
  declinePercent: 25,
};

/**
 * Merge user overrides onto defaults.
 * Returns a fully-resolved config with no optional fields.
 */
export function resolveThresholds(overrides?: ThresholdConfig): Required<ThresholdConfig> {
  if (!overrides) return { ...DEFAULT_THRESHOLDS };
  return {
    surgePercent: overrides.surgePercent ?? DEFAULT_THRESHOLDS.surgePercent,
    declinePercent: overrides.declinePercent ?? DEFAULT_THRESHOLDS.declinePercent,
  };
}
