/**
 * Growth Highlights
 *
 * Picks out quarters whose growth crossed the surge or decline thresholds.
 * Pure functions — no I/O, all data passed in.
 */

import type { GrowthRecord } from '../types/metrics.js';
import type { GrowthHighlight } from './types.js';
import type { ThresholdConfig } from '../config/thresholds.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';
import { formatNumber, formatPeriod } from '../generators/format.js';

/**
 * Classify a single record. Records without a percentage are never highlighted.
 */
export function classifyGrowth(
  record: GrowthRecord,
  thresholds: Required<ThresholdConfig> = DEFAULT_THRESHOLDS
): GrowthHighlight['kind'] | null {
  const pct = record.percentGrowth;
  if (pct === null) return null;
  if (pct >= thresholds.surgePercent) return 'surge';
  if (pct <= -thresholds.declinePercent) return 'decline';
  return null;
}

/**
 * Surges (largest first) followed by declines (steepest first).
 */
export function findHighlights(
  records: readonly GrowthRecord[],
  thresholds?: Required<ThresholdConfig>
): GrowthHighlight[] {
  const t = thresholds ?? DEFAULT_THRESHOLDS;
  const surges: GrowthHighlight[] = [];
  const declines: GrowthHighlight[] = [];

  for (const record of records) {
    const kind = classifyGrowth(record, t);
    if (kind === 'surge') {
      surges.push({ kind, record, message: describeRecord(record) });
    } else if (kind === 'decline') {
      declines.push({ kind, record, message: describeRecord(record) });
    }
  }

  surges.sort((a, b) => percentOf(b) - percentOf(a));
  declines.sort((a, b) => percentOf(a) - percentOf(b));
  return [...surges, ...declines];
}

// ─── Internals ──────────────────────────────────────────────

function percentOf(highlight: GrowthHighlight): number {
  return highlight.record.percentGrowth ?? 0;
}

function describeRecord(record: GrowthRecord): string {
  const pct = record.percentGrowth ?? 0;
  const sign = pct > 0 ? '+' : '';
  return (
    `${record.entityKey} ${formatPeriod(record.currentYear, record.currentQuarter)}: ` +
    `${sign}${pct.toFixed(2)}% ` +
    `(${formatNumber(record.previousValue ?? 0)} → ${formatNumber(record.currentValue)})`
  );
}
