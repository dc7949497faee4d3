/**
 * Report Runner
 *
 * Connects the dataset store, the growth analyzer and the report generators.
 * Shared by the MCP server and the CLI so both validate and render the same way.
 */

import type { DatasetStore } from '../dataset/dataset-store.js';
import type { QuarterscopeSettings } from '../config/types.js';
import type { GrowthMeasure, GrowthSource } from '../types/dataset.js';
import { resolveThresholds } from '../config/thresholds.js';
import { analyzePeriodGrowth } from '../analysis/period-growth.js';
import {
  generateGrowthReport,
  generateTransactionReport,
  generateDeviceReport,
  generateInsuranceReport,
  generateCategoryReport,
  generateEngagementReport,
} from '../generators/report-generator.js';
import {
  GrowthArgsSchema,
  GrowthFromPointsArgsSchema,
  StateFilterArgsSchema,
  CategoryArgsSchema,
} from '../validators.js';

type ToolArgs = Record<string, unknown> | undefined;

export interface ReportRunner {
  growth(args: ToolArgs): string;
  transactions(args: ToolArgs): string;
  devices(): string;
  insurance(args: ToolArgs): string;
  categories(args: ToolArgs): string;
  engagement(args: ToolArgs): string;
}

const SOURCE_TITLES: Record<GrowthSource, string> = {
  transactions: 'Transaction',
  insurance: 'Insurance',
};

const MEASURE_TITLES: Record<GrowthMeasure, string> = {
  count: 'Count',
  amount: 'Amount',
};

/**
 * Growth report for a caller-supplied series. Needs no dataset.
 * Throws ZodError for malformed arguments, DuplicateKeyError or
 * InvalidQuarterError for points the analyzer rejects.
 */
export function runGrowthFromPoints(args: ToolArgs, settings: QuarterscopeSettings): string {
  const { points, entityLabel, limit } = GrowthFromPointsArgsSchema.parse(args ?? {});
  const records = analyzePeriodGrowth(points);
  return generateGrowthReport(records, {
    title: 'Quarterly Growth',
    entityLabel,
    limit: limit ?? settings.report.limit,
    thresholds: resolveThresholds(settings.report.thresholds),
  });
}

/**
 * Build a runner over an open store. Throws ZodError for malformed arguments;
 * analyzer and database errors propagate unchanged.
 */
export function createReportRunner(
  store: DatasetStore,
  settings: QuarterscopeSettings
): ReportRunner {
  const thresholds = resolveThresholds(settings.report.thresholds);

  return {
    growth(args) {
      const { source, measure, states, limit } = GrowthArgsSchema.parse(args ?? {});
      const points = store.metricSeries(source, measure, { states });
      const records = analyzePeriodGrowth(points);
      return generateGrowthReport(records, {
        title: `Quarterly ${SOURCE_TITLES[source]} ${MEASURE_TITLES[measure]} Growth`,
        entityLabel: 'State',
        limit: limit ?? settings.report.limit,
        thresholds,
      });
    },

    transactions(args) {
      const { states } = StateFilterArgsSchema.parse(args ?? {});
      return generateTransactionReport(store.transactionTotals({ states }));
    },

    devices() {
      return generateDeviceReport(store.deviceBrandUsage());
    },

    insurance(args) {
      const { states } = StateFilterArgsSchema.parse(args ?? {});
      return generateInsuranceReport(store.insuranceTotals({ states }));
    },

    categories(args) {
      const { states, categories } = CategoryArgsSchema.parse(args ?? {});
      return generateCategoryReport(store.categoryTrends({ states, categories }));
    },

    engagement(args) {
      const { states } = StateFilterArgsSchema.parse(args ?? {});
      return generateEngagementReport(store.userEngagement({ states }));
    },
  };
}
