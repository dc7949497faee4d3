/**
 * Dataset Store
 *
 * Read-only aggregation queries over the payments dataset.
 * Uses better-sqlite3 for synchronous, fast local access.
 *
 * The database and its tables are provided by whoever produced the dataset;
 * this store never creates, alters or writes anything.
 */

import Database from 'better-sqlite3';
import type {
  CategoryTrend,
  DatasetFilter,
  DeviceBrandUsage,
  GrowthMeasure,
  GrowthSource,
  InsuranceTotal,
  TransactionTotal,
  UserEngagement,
} from '../types/dataset.js';
import type { MetricPoint } from '../types/metrics.js';
import { readSettings, resolveDatasetPath } from '../config/settings.js';

const SOURCE_TABLES: Record<GrowthSource, string> = {
  transactions: 'aggregated_transactions',
  insurance: 'aggregated_insurance',
};

export class DatasetStore {
  private db: Database.Database;

  /**
   * Open the dataset. Accepts a file path, an already-open handle (used by tests
   * and embedders), or nothing to use the configured location.
   */
  constructor(source?: string | Database.Database) {
    if (typeof source === 'object') {
      this.db = source;
    } else {
      const path = source ?? resolveDatasetPath(readSettings());
      this.db = new Database(path, { readonly: true, fileMustExist: true });
    }
  }

  /**
   * Total transaction count and amount by state and quarter.
   * Rows without a state are excluded.
   */
  transactionTotals(filter: DatasetFilter = {}): TransactionTotal[] {
    const states = whereIn('state_name', filter.states);
    const rows = this.db
      .prepare(
        `SELECT state_name, year, quarter,
                SUM(count) AS total_transactions,
                SUM(amount) AS total_amount
         FROM aggregated_transactions
         WHERE state_name IS NOT NULL ${states.sql ? `AND ${states.sql}` : ''}
         GROUP BY state_name, year, quarter
         ORDER BY year, quarter, total_transactions DESC`
      )
      .all(...states.params) as TransactionTotalRow[];

    return rows.map((row) => ({
      stateName: row.state_name,
      year: row.year,
      quarter: row.quarter,
      totalTransactions: row.total_transactions,
      totalAmount: row.total_amount,
    }));
  }

  /**
   * Registered users and average usage share per device brand.
   */
  deviceBrandUsage(): DeviceBrandUsage[] {
    const rows = this.db
      .prepare(
        `SELECT brand,
                SUM(count) AS total_registered_users,
                ROUND(AVG(percentage), 2) AS avg_percentage_usage
         FROM users_by_device
         GROUP BY brand
         ORDER BY total_registered_users DESC`
      )
      .all() as DeviceBrandUsageRow[];

    return rows.map((row) => ({
      brand: row.brand,
      totalRegisteredUsers: row.total_registered_users,
      avgPercentageUsage: row.avg_percentage_usage,
    }));
  }

  /**
   * Insurance policies sold and their value by state and quarter.
   * Rows without a state are excluded.
   */
  insuranceTotals(filter: DatasetFilter = {}): InsuranceTotal[] {
    const states = whereIn('state_name', filter.states);
    const rows = this.db
      .prepare(
        `SELECT state_name, year, quarter,
                SUM(count) AS total_policies_sold,
                SUM(amount) AS total_value
         FROM aggregated_insurance
         WHERE state_name IS NOT NULL ${states.sql ? `AND ${states.sql}` : ''}
         GROUP BY state_name, year, quarter
         ORDER BY total_policies_sold DESC`
      )
      .all(...states.params) as InsuranceTotalRow[];

    return rows.map((row) => ({
      stateName: row.state_name,
      year: row.year,
      quarter: row.quarter,
      totalPoliciesSold: row.total_policies_sold,
      totalValue: row.total_value,
    }));
  }

  /**
   * Yearly transaction amount per payment category.
   */
  categoryTrends(filter: DatasetFilter = {}): CategoryTrend[] {
    const states = whereIn('state_name', filter.states);
    const categories = whereIn('category_name', filter.categories);
    const clauses = [states.sql, categories.sql].filter(Boolean);
    const rows = this.db
      .prepare(
        `SELECT category_name, year, SUM(amount) AS total_amount
         FROM aggregated_transactions
         ${clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : ''}
         GROUP BY category_name, year
         ORDER BY category_name, year`
      )
      .all(...states.params, ...categories.params) as CategoryTrendRow[];

    return rows.map((row) => ({
      categoryName: row.category_name,
      year: row.year,
      totalAmount: row.total_amount,
    }));
  }

  /**
   * Registered users against app opens per state. Rows without a state are excluded.
   */
  userEngagement(filter: DatasetFilter = {}): UserEngagement[] {
    const states = whereIn('state_name', filter.states);
    const rows = this.db
      .prepare(
        `SELECT state_name,
                SUM(registered_users) AS total_registered_users,
                SUM(app_opens) AS total_app_opens
         FROM map_users
         WHERE state_name IS NOT NULL ${states.sql ? `AND ${states.sql}` : ''}
         GROUP BY state_name
         ORDER BY total_registered_users DESC`
      )
      .all(...states.params) as UserEngagementRow[];

    return rows.map((row) => ({
      stateName: row.state_name,
      totalRegisteredUsers: row.total_registered_users,
      totalAppOpens: row.total_app_opens,
    }));
  }

  /**
   * One point per state and quarter, summing the chosen measure.
   * This is the input series for growth analysis.
   */
  metricSeries(
    source: GrowthSource,
    measure: GrowthMeasure,
    filter: DatasetFilter = {}
  ): MetricPoint[] {
    const table = SOURCE_TABLES[source];
    const column = measure === 'count' ? 'count' : 'amount';
    const states = whereIn('state_name', filter.states);
    const rows = this.db
      .prepare(
        `SELECT state_name, year, quarter, SUM(${column}) AS value
         FROM ${table}
         WHERE state_name IS NOT NULL ${states.sql ? `AND ${states.sql}` : ''}
         GROUP BY state_name, year, quarter
         ORDER BY state_name, year, quarter`
      )
      .all(...states.params) as MetricSeriesRow[];

    return rows.map((row) => ({
      entityKey: row.state_name,
      year: row.year,
      quarter: row.quarter,
      value: row.value,
    }));
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }
}

// ─── Query Helpers ──────────────────────────────────────────

interface WhereClause {
  sql: string;
  params: string[];
}

function whereIn(column: string, values: string[] | undefined): WhereClause {
  if (!values || values.length === 0) {
    return { sql: '', params: [] };
  }
  return {
    sql: `${column} IN (${values.map(() => '?').join(', ')})`,
    params: values,
  };
}

// ─── Row Types ──────────────────────────────────────────────

interface TransactionTotalRow {
  state_name: string;
  year: number;
  quarter: number;
  total_transactions: number;
  total_amount: number;
}

interface DeviceBrandUsageRow {
  brand: string;
  total_registered_users: number;
  avg_percentage_usage: number;
}

interface InsuranceTotalRow {
  state_name: string;
  year: number;
  quarter: number;
  total_policies_sold: number;
  total_value: number;
}

interface CategoryTrendRow {
  category_name: string;
  year: number;
  total_amount: number;
}

interface UserEngagementRow {
  state_name: string;
  total_registered_users: number;
  total_app_opens: number;
}

interface MetricSeriesRow {
  state_name: string;
  year: number;
  quarter: number;
  value: number;
}
