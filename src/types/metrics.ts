/**
 * Metric Types
 *
 * Time-bucketed metric series and the growth records derived from them.
 */

/** A (year, quarter) aggregation window. */
export interface PeriodKey {
  year: number;
  quarter: number;
}

/** One pre-aggregated value per entity and quarter. */
export interface MetricPoint {
  entityKey: string;
  year: number;
  quarter: number;
  value: number;
}

/**
 * Change of one bucket against the immediately preceding quarter of the same entity.
 * The growth fields are null when there is no previous bucket; percentGrowth is
 * also null when the previous value is zero.
 */
export interface GrowthRecord {
  readonly entityKey: string;
  readonly currentYear: number;
  readonly currentQuarter: number;
  readonly currentValue: number;
  readonly previousValue: number | null;
  readonly absoluteGrowth: number | null;
  readonly percentGrowth: number | null;
}
