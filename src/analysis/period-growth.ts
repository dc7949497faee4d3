/**
 * Period Growth Analyzer
 *
 * Pure functions to compare each quarterly bucket of a metric series against
 * the immediately preceding quarter of the same entity.
 * No I/O — all data passed in, results returned.
 */

import type { GrowthRecord, MetricPoint, PeriodKey } from '../types/metrics.js';
import { DuplicateKeyError, InvalidQuarterError } from './errors.js';

/**
 * The quarter right before the given one. Q1 rolls back to Q4 of the previous year.
 */
export function previousPeriod(period: PeriodKey): PeriodKey {
  return period.quarter > 1
    ? { year: period.year, quarter: period.quarter - 1 }
    : { year: period.year - 1, quarter: 4 };
}

/**
 * Round half away from zero, matching SQL ROUND on numeric values.
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const rounded = Math.round((Math.abs(value) + Number.EPSILON) * factor) / factor;
  // Avoid returning -0
  return rounded === 0 ? 0 : Math.sign(value) * rounded;
}

/**
 * Compute quarter-over-quarter growth for every point.
 *
 * Returns one record per input point, sorted by percentGrowth descending.
 * Records without a percentage sort last; ties keep their input order.
 *
 * Throws InvalidQuarterError for a quarter outside 1..4 and DuplicateKeyError
 * when two points share entity, year and quarter.
 */
export function analyzePeriodGrowth(points: readonly MetricPoint[]): GrowthRecord[] {
  const values = new Map<string, number>();

  for (const point of points) {
    if (!Number.isInteger(point.quarter) || point.quarter < 1 || point.quarter > 4) {
      throw new InvalidQuarterError(point.quarter, point.entityKey);
    }
    const key = bucketKey(point.entityKey, point);
    if (values.has(key)) {
      throw new DuplicateKeyError(point);
    }
    values.set(key, point.value);
  }

  const records = points.map((point) => {
    const previousValue = values.get(bucketKey(point.entityKey, previousPeriod(point))) ?? null;
    return buildRecord(point, previousValue);
  });

  return records.sort(byPercentGrowthDesc);
}

// ─── Internals ──────────────────────────────────────────────

function bucketKey(entityKey: string, period: PeriodKey): string {
  // Entity keys may contain any character, so encode rather than join
  return JSON.stringify([entityKey, period.year, period.quarter]);
}

function buildRecord(point: MetricPoint, previousValue: number | null): GrowthRecord {
  let absoluteGrowth: number | null = null;
  let percentGrowth: number | null = null;

  if (previousValue !== null) {
    absoluteGrowth = point.value - previousValue;
    percentGrowth = previousValue === 0 ? null : roundTo((absoluteGrowth * 100) / previousValue, 2);
  }

  return Object.freeze({
    entityKey: point.entityKey,
    currentYear: point.year,
    currentQuarter: point.quarter,
    currentValue: point.value,
    previousValue,
    absoluteGrowth,
    percentGrowth,
  });
}

function byPercentGrowthDesc(a: GrowthRecord, b: GrowthRecord): number {
  if (a.percentGrowth === null && b.percentGrowth === null) return 0;
  if (a.percentGrowth === null) return 1;
  if (b.percentGrowth === null) return -1;
  return b.percentGrowth - a.percentGrowth;
}
