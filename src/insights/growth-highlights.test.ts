import { describe, it, expect } from 'vitest';
import { classifyGrowth, findHighlights } from './growth-highlights.js';
import { resolveThresholds } from '../config/thresholds.js';
import type { GrowthRecord } from '../types/metrics.js';

function makeRecord(overrides: Partial<GrowthRecord> = {}): GrowthRecord {
  return {
    entityKey: 'goa',
    currentYear: 2024,
    currentQuarter: 1,
    currentValue: 150,
    previousValue: 100,
    absoluteGrowth: 50,
    percentGrowth: 50,
    ...overrides,
  };
}

describe('growth-highlights', () => {
  describe('classifyGrowth', () => {
    it('flags growth at the surge threshold', () => {
      expect(classifyGrowth(makeRecord({ percentGrowth: 50 }))).toBe('surge');
    });

    it('flags a drop at the decline threshold', () => {
      expect(classifyGrowth(makeRecord({ percentGrowth: -25 }))).toBe('decline');
    });

    it('ignores moderate changes', () => {
      expect(classifyGrowth(makeRecord({ percentGrowth: 49.99 }))).toBeNull();
      expect(classifyGrowth(makeRecord({ percentGrowth: -24.99 }))).toBeNull();
    });

    it('ignores records without a percentage', () => {
      expect(classifyGrowth(makeRecord({ percentGrowth: null }))).toBeNull();
    });

    it('honours custom thresholds', () => {
      const t = resolveThresholds({ surgePercent: 10, declinePercent: 5 });
      expect(classifyGrowth(makeRecord({ percentGrowth: 12 }), t)).toBe('surge');
      expect(classifyGrowth(makeRecord({ percentGrowth: -6 }), t)).toBe('decline');
    });
  });

  describe('findHighlights', () => {
    it('returns surges largest first, then declines steepest first', () => {
      const highlights = findHighlights([
        makeRecord({ entityKey: 'a', percentGrowth: 60 }),
        makeRecord({ entityKey: 'b', percentGrowth: -30 }),
        makeRecord({ entityKey: 'c', percentGrowth: 200 }),
        makeRecord({ entityKey: 'd', percentGrowth: 5 }),
        makeRecord({ entityKey: 'e', percentGrowth: -80 }),
      ]);

      expect(highlights.map((h) => [h.kind, h.record.entityKey])).toEqual([
        ['surge', 'c'],
        ['surge', 'a'],
        ['decline', 'e'],
        ['decline', 'b'],
      ]);
    });

    it('describes each highlight', () => {
      const [surge, decline] = findHighlights([
        makeRecord(),
        makeRecord({
          entityKey: 'kerala',
          currentQuarter: 3,
          currentValue: 60,
          previousValue: 80,
          absoluteGrowth: -20,
          percentGrowth: -25,
        }),
      ]);

      expect(surge?.message).toBe('goa 2024-Q1: +50.00% (100 → 150)');
      expect(decline?.message).toBe('kerala 2024-Q3: -25.00% (80 → 60)');
    });

    it('formats values with thousands separators', () => {
      const [surge] = findHighlights([
        makeRecord({ currentValue: 1500000, previousValue: 1000000, absoluteGrowth: 500000 }),
      ]);
      expect(surge?.message).toBe('goa 2024-Q1: +50.00% (1,000,000 → 1,500,000)');
    });

    it('returns empty array when nothing crosses a threshold', () => {
      expect(findHighlights([makeRecord({ percentGrowth: 3 })])).toEqual([]);
    });
  });
});
