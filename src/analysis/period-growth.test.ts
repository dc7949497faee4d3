import { describe, it, expect } from 'vitest';
import { analyzePeriodGrowth, previousPeriod, roundTo } from './period-growth.js';
import { DuplicateKeyError, InvalidQuarterError } from './errors.js';
import type { MetricPoint } from '../types/metrics.js';

function point(entityKey: string, year: number, quarter: number, value: number): MetricPoint {
  return { entityKey, year, quarter, value };
}

describe('period-growth', () => {
  describe('previousPeriod', () => {
    it('rolls Q1 back to Q4 of the previous year', () => {
      expect(previousPeriod({ year: 2024, quarter: 1 })).toEqual({ year: 2023, quarter: 4 });
    });

    it('steps back one quarter within the same year for Q2-Q4', () => {
      expect(previousPeriod({ year: 2024, quarter: 2 })).toEqual({ year: 2024, quarter: 1 });
      expect(previousPeriod({ year: 2024, quarter: 3 })).toEqual({ year: 2024, quarter: 2 });
      expect(previousPeriod({ year: 2024, quarter: 4 })).toEqual({ year: 2024, quarter: 3 });
    });
  });

  describe('roundTo', () => {
    it('rounds to two decimals', () => {
      expect(roundTo(33.333333, 2)).toBe(33.33);
      expect(roundTo(66.666666, 2)).toBe(66.67);
    });

    it('rounds halves away from zero', () => {
      expect(roundTo(1.005, 2)).toBe(1.01);
      expect(roundTo(-2.5, 0)).toBe(-3);
    });

    it('never returns negative zero', () => {
      expect(Object.is(roundTo(-0.001, 2), 0)).toBe(true);
    });
  });

  describe('analyzePeriodGrowth', () => {
    it('computes growth across a year rollover', () => {
      const records = analyzePeriodGrowth([point('S1', 2023, 4, 100), point('S1', 2024, 1, 150)]);

      expect(records[0]).toEqual({
        entityKey: 'S1',
        currentYear: 2024,
        currentQuarter: 1,
        currentValue: 150,
        previousValue: 100,
        absoluteGrowth: 50,
        percentGrowth: 50,
      });
    });

    it('emits a record without growth when there is no previous bucket', () => {
      const records = analyzePeriodGrowth([point('S1', 2024, 1, 150)]);

      expect(records).toEqual([
        {
          entityKey: 'S1',
          currentYear: 2024,
          currentQuarter: 1,
          currentValue: 150,
          previousValue: null,
          absoluteGrowth: null,
          percentGrowth: null,
        },
      ]);
    });

    it('leaves percent growth empty when the previous value is zero', () => {
      const records = analyzePeriodGrowth([point('S1', 2023, 1, 0), point('S1', 2023, 2, 20)]);
      const q2 = records.find((r) => r.currentQuarter === 2);

      expect(q2?.previousValue).toBe(0);
      expect(q2?.absoluteGrowth).toBe(20);
      expect(q2?.percentGrowth).toBeNull();
    });

    it('does not fall back to an earlier bucket across a gap', () => {
      const records = analyzePeriodGrowth([point('S1', 2023, 1, 100), point('S1', 2023, 3, 300)]);
      const q3 = records.find((r) => r.currentQuarter === 3);

      expect(q3?.previousValue).toBeNull();
      expect(q3?.absoluteGrowth).toBeNull();
    });

    it('does not treat Q4 of the same year as the predecessor of Q1', () => {
      const records = analyzePeriodGrowth([point('S1', 2024, 4, 100), point('S1', 2024, 1, 50)]);
      const q1 = records.find((r) => r.currentQuarter === 1);

      expect(q1?.previousValue).toBeNull();
    });

    it('only compares buckets of the same entity', () => {
      const records = analyzePeriodGrowth([point('S1', 2023, 1, 100), point('S2', 2023, 2, 300)]);

      expect(records.every((r) => r.previousValue === null)).toBe(true);
    });

    it('preserves the number of points', () => {
      const input = [
        point('S1', 2023, 1, 10),
        point('S1', 2023, 2, 20),
        point('S2', 2023, 2, 5),
        point('S2', 2023, 3, 0),
        point('S3', 2022, 4, 7),
      ];

      expect(analyzePeriodGrowth(input)).toHaveLength(input.length);
    });

    it('reports negative growth for a decline', () => {
      const records = analyzePeriodGrowth([point('S1', 2023, 2, 80), point('S1', 2023, 3, 60)]);
      const q3 = records.find((r) => r.currentQuarter === 3);

      expect(q3?.absoluteGrowth).toBe(-20);
      expect(q3?.percentGrowth).toBe(-25);
    });

    it('rounds percent growth to two decimals', () => {
      const records = analyzePeriodGrowth([point('S1', 2023, 1, 3), point('S1', 2023, 2, 4)]);

      expect(records[0]?.percentGrowth).toBe(33.33);
    });

    it('sorts by percent growth descending with empty values last', () => {
      const records = analyzePeriodGrowth([
        point('A', 2023, 1, 100),
        point('A', 2023, 2, 110), // +10%
        point('B', 2023, 1, 100),
        point('B', 2023, 2, 200), // +100%
        point('C', 2023, 1, 100),
        point('C', 2023, 2, 50), // -50%
      ]);

      expect(records.map((r) => [r.entityKey, r.percentGrowth])).toEqual([
        ['B', 100],
        ['A', 10],
        ['C', -50],
        ['A', null],
        ['B', null],
        ['C', null],
      ]);
    });

    it('keeps input order among equal percentages', () => {
      const records = analyzePeriodGrowth([
        point('Z', 2023, 2, 20),
        point('Z', 2023, 1, 10),
        point('M', 2023, 2, 4),
        point('M', 2023, 1, 2),
        point('A', 2023, 2, 6),
        point('A', 2023, 1, 3),
      ]);

      expect(records.map((r) => r.entityKey)).toEqual(['Z', 'M', 'A', 'Z', 'M', 'A']);
      expect(records.slice(0, 3).map((r) => r.percentGrowth)).toEqual([100, 100, 100]);
    });

    it('accepts unordered input', () => {
      const records = analyzePeriodGrowth([
        point('S1', 2024, 2, 300),
        point('S1', 2023, 4, 100),
        point('S1', 2024, 1, 200),
      ]);

      expect(records.map((r) => [r.currentYear, r.currentQuarter, r.percentGrowth])).toEqual([
        [2024, 1, 100],
        [2024, 2, 50],
        [2023, 4, null],
      ]);
    });

    it('returns frozen records', () => {
      const [record] = analyzePeriodGrowth([point('S1', 2024, 1, 1)]);
      expect(Object.isFrozen(record)).toBe(true);
    });

    it('returns an empty array for empty input', () => {
      expect(analyzePeriodGrowth([])).toEqual([]);
    });

    it('throws DuplicateKeyError for a repeated entity and quarter', () => {
      const input = [point('S1', 2023, 1, 10), point('S1', 2023, 1, 12)];

      expect(() => analyzePeriodGrowth(input)).toThrow(DuplicateKeyError);
      expect(() => analyzePeriodGrowth(input)).toThrow('Duplicate metric point for S1 2023-Q1');
    });

    it('throws InvalidQuarterError for a quarter outside 1..4', () => {
      expect(() => analyzePeriodGrowth([point('S1', 2023, 5, 10)])).toThrow(InvalidQuarterError);
      expect(() => analyzePeriodGrowth([point('S1', 2023, 0, 10)])).toThrow(InvalidQuarterError);
      expect(() => analyzePeriodGrowth([point('S1', 2023, 2.5, 10)])).toThrow(InvalidQuarterError);
    });

    it('carries the offending data on the errors', () => {
      try {
        analyzePeriodGrowth([point('S1', 2023, 7, 10)]);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidQuarterError);
        if (error instanceof InvalidQuarterError) {
          expect(error.quarter).toBe(7);
          expect(error.entityKey).toBe('S1');
          expect(error.name).toBe('InvalidQuarterError');
        }
      }
    });
  });
});
