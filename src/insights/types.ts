/**
 * Insight Types
 *
 * Data structures for growth highlights.
 */

import type { GrowthRecord } from '../types/metrics.js';

/** A growth record that crossed a highlight threshold. */
export interface GrowthHighlight {
  kind: 'surge' | 'decline';
  record: GrowthRecord;
  message: string;
}
