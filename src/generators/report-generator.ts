/**
 * Report Generator
 *
 * Transforms query results and growth records into Markdown reports.
 * All functions are synchronous — no I/O, no database access.
 */

import type { GrowthRecord } from '../types/metrics.js';
import type {
  CategoryTrend,
  DeviceBrandUsage,
  InsuranceTotal,
  TransactionTotal,
  UserEngagement,
} from '../types/dataset.js';
import type { ThresholdConfig } from '../config/thresholds.js';
import { DEFAULT_THRESHOLDS } from '../config/thresholds.js';
import { findHighlights } from '../insights/growth-highlights.js';
import { escapeCell, formatNumber, formatPeriod } from './format.js';

export interface GrowthReportOptions {
  title: string;
  /** Column heading for the entity key, e.g. "State". */
  entityLabel?: string;
  /** Maximum table rows, and maximum highlight lines. */
  limit: number;
  thresholds?: Required<ThresholdConfig>;
}

const EMPTY = '—';
const NO_DATA = '_No data_';

function formatSigned(value: number | null): string {
  if (value === null) return EMPTY;
  return `${value > 0 ? '+' : ''}${formatNumber(value)}`;
}

function formatPercent(value: number | null): string {
  if (value === null) return EMPTY;
  return `${value > 0 ? '+' : ''}${value.toFixed(2)}%`;
}

/**
 * Growth table (top rows by percent growth) plus threshold highlights.
 * Expects records already ordered by analyzePeriodGrowth.
 */
export function generateGrowthReport(
  records: readonly GrowthRecord[],
  options: GrowthReportOptions
): string {
  const entityLabel = escapeCell(options.entityLabel ?? 'Entity');
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  const withPrevious = records.filter((r) => r.previousValue !== null).length;

  const parts: string[] = [];
  parts.push(`# ${options.title}`);
  parts.push('');
  parts.push(`**Buckets:** ${records.length} · **With previous quarter:** ${withPrevious}`);
  parts.push('');

  parts.push('## Growth by Quarter');
  parts.push('');
  if (records.length === 0) {
    parts.push(NO_DATA);
  } else {
    const shown = records.slice(0, options.limit);
    parts.push(`| # | ${entityLabel} | Quarter | Current | Previous | Growth | Growth % |`);
    parts.push('|---|---|---|---|---|---|---|');
    shown.forEach((r, i) => {
      const previous = r.previousValue === null ? EMPTY : formatNumber(r.previousValue);
      parts.push(
        `| ${i + 1} | ${escapeCell(r.entityKey)} | ${formatPeriod(r.currentYear, r.currentQuarter)} | ` +
          `${formatNumber(r.currentValue)} | ${previous} | ${formatSigned(r.absoluteGrowth)} | ` +
          `${formatPercent(r.percentGrowth)} |`
      );
    });
    if (shown.length < records.length) {
      parts.push('');
      parts.push(`_Showing ${shown.length} of ${records.length} buckets_`);
    }
  }
  parts.push('');

  parts.push('## Highlights');
  parts.push('');
  const highlights = findHighlights(records, thresholds);
  if (highlights.length === 0) {
    parts.push(
      `_No quarter grew ${thresholds.surgePercent}% or more, or fell ${thresholds.declinePercent}% or more_`
    );
  } else {
    const listed = highlights.slice(0, options.limit);
    for (const h of listed) {
      parts.push(`- [${h.kind}] ${h.message}`);
    }
    if (listed.length < highlights.length) {
      parts.push('');
      parts.push(`_and ${highlights.length - listed.length} more_`);
    }
  }

  return parts.join('\n');
}

export function generateTransactionReport(rows: readonly TransactionTotal[]): string {
  const parts: string[] = ['# Transaction Totals by State', ''];
  if (rows.length === 0) {
    parts.push(NO_DATA);
    return parts.join('\n');
  }
  parts.push('| State | Quarter | Transactions | Amount |');
  parts.push('|---|---|---|---|');
  for (const r of rows) {
    parts.push(
      `| ${escapeCell(r.stateName)} | ${formatPeriod(r.year, r.quarter)} | ` +
        `${formatNumber(r.totalTransactions)} | ${formatNumber(r.totalAmount)} |`
    );
  }
  return parts.join('\n');
}

export function generateDeviceReport(rows: readonly DeviceBrandUsage[]): string {
  const parts: string[] = ['# Device Brand Usage', ''];
  if (rows.length === 0) {
    parts.push(NO_DATA);
    return parts.join('\n');
  }
  const totalUsers = rows.reduce((sum, r) => sum + r.totalRegisteredUsers, 0);
  parts.push('| Brand | Registered Users | Share | Avg Usage |');
  parts.push('|---|---|---|---|');
  for (const r of rows) {
    const share =
      totalUsers > 0 ? `${((r.totalRegisteredUsers / totalUsers) * 100).toFixed(1)}%` : EMPTY;
    parts.push(
      `| ${escapeCell(r.brand)} | ${formatNumber(r.totalRegisteredUsers)} | ${share} | ` +
        `${r.avgPercentageUsage.toFixed(2)} |`
    );
  }
  return parts.join('\n');
}

export function generateInsuranceReport(rows: readonly InsuranceTotal[]): string {
  const parts: string[] = ['# Insurance Policies by State', ''];
  if (rows.length === 0) {
    parts.push(NO_DATA);
    return parts.join('\n');
  }
  parts.push('| State | Quarter | Policies Sold | Value |');
  parts.push('|---|---|---|---|');
  for (const r of rows) {
    parts.push(
      `| ${escapeCell(r.stateName)} | ${formatPeriod(r.year, r.quarter)} | ` +
        `${formatNumber(r.totalPoliciesSold)} | ${formatNumber(r.totalValue)} |`
    );
  }
  return parts.join('\n');
}

export function generateCategoryReport(rows: readonly CategoryTrend[]): string {
  const parts: string[] = ['# Transaction Amount by Category', ''];
  if (rows.length === 0) {
    parts.push(NO_DATA);
    return parts.join('\n');
  }
  parts.push('| Category | Year | Amount |');
  parts.push('|---|---|---|');
  for (const r of rows) {
    parts.push(`| ${escapeCell(r.categoryName)} | ${r.year} | ${formatNumber(r.totalAmount)} |`);
  }
  return parts.join('\n');
}

export function generateEngagementReport(rows: readonly UserEngagement[]): string {
  const parts: string[] = ['# User Engagement by State', ''];
  if (rows.length === 0) {
    parts.push(NO_DATA);
    return parts.join('\n');
  }
  parts.push('| State | Registered Users | App Opens | Opens per User |');
  parts.push('|---|---|---|---|');
  for (const r of rows) {
    const perUser =
      r.totalRegisteredUsers > 0 ? (r.totalAppOpens / r.totalRegisteredUsers).toFixed(2) : EMPTY;
    parts.push(
      `| ${escapeCell(r.stateName)} | ${formatNumber(r.totalRegisteredUsers)} | ` +
        `${formatNumber(r.totalAppOpens)} | ${perUser} |`
    );
  }
  return parts.join('\n');
}
