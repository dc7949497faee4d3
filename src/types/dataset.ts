/**
 * Dataset Types
 *
 * Row shapes returned by the aggregation queries in DatasetStore.
 */

export const GROWTH_SOURCES = ['transactions', 'insurance'] as const;
export const GROWTH_MEASURES = ['count', 'amount'] as const;

/** Which table a growth series is built from. */
export type GrowthSource = (typeof GROWTH_SOURCES)[number];

/** Which column is summed per bucket. */
export type GrowthMeasure = (typeof GROWTH_MEASURES)[number];

/** Narrows a query to the selected states and categories. Empty lists mean "all". */
export interface DatasetFilter {
  states?: string[];
  categories?: string[];
}

export interface TransactionTotal {
  stateName: string;
  year: number;
  quarter: number;
  totalTransactions: number;
  totalAmount: number;
}

export interface DeviceBrandUsage {
  brand: string;
  totalRegisteredUsers: number;
  avgPercentageUsage: number;
}

export interface InsuranceTotal {
  stateName: string;
  year: number;
  quarter: number;
  totalPoliciesSold: number;
  totalValue: number;
}

export interface CategoryTrend {
  categoryName: string;
  year: number;
  totalAmount: number;
}

export interface UserEngagement {
  stateName: string;
  totalRegisteredUsers: number;
  totalAppOpens: number;
}
