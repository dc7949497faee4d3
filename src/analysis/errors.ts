/**
 * Analysis Errors
 *
 * Precondition failures raised by the growth analyzer. Both point at a defect in
 * the upstream aggregation, so callers should surface them rather than retry.
 */

import type { MetricPoint } from '../types/metrics.js';

export class DuplicateKeyError extends Error {
  constructor(public key: Pick<MetricPoint, 'entityKey' | 'year' | 'quarter'>) {
    super(
      `Duplicate metric point for ${key.entityKey} ${key.year}-Q${key.quarter}. ` +
        'Input must be aggregated to one value per entity and quarter.'
    );
    this.name = 'DuplicateKeyError';
  }
}

export class InvalidQuarterError extends Error {
  constructor(
    public quarter: number,
    public entityKey: string
  ) {
    super(`Invalid quarter ${quarter} for ${entityKey}: expected an integer from 1 to 4`);
    this.name = 'InvalidQuarterError';
  }
}
