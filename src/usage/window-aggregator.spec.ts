import { createTable, Row } from '../common/table';
import {
  bucketBounds,
  parseUsageWindow,
  summarizeUsage,
  USAGE_SUMMARY_COLUMNS,
} from './window-aggregator';

function usage(...rows: Row[]) {
  return createTable<Row>(
    ['sourceTag', 'servicePointId', 'intervalStartTs', 'value'],
    rows,
  );
}

function reading(
  start: string | null,
  value: number | null,
  overrides: Row = {},
): Row {
  return {
    sourceTag: 'UTILITY1',
    servicePointId: 'SP-1',
    intervalStartTs: start === null ? null : new Date(start),
    value,
    ...overrides,
  };
}

describe('window-aggregator', () => {
  describe('parseUsageWindow', () => {
    it('should accept names and one-letter aliases', () => {
      expect(parseUsageWindow('daily')).toBe('daily');
      expect(parseUsageWindow('H')).toBe('hourly');
      expect(parseUsageWindow('w')).toBe('weekly');
      expect(parseUsageWindow(' Monthly ')).toBe('monthly');
    });

    it('should return null for unsupported windows', () => {
      expect(parseUsageWindow('yearly')).toBeNull();
      expect(parseUsageWindow('')).toBeNull();
      expect(parseUsageWindow('constructor')).toBeNull();
    });

    it('should return null for a repeated query parameter', () => {
      expect(parseUsageWindow(['daily', 'hourly'])).toBeNull();
    });
  });

  describe('bucketBounds', () => {
    const ts = new Date('2025-10-01T08:15:00Z');

    it('should align hourly buckets to the hour', () => {
      expect(bucketBounds(ts, 'hourly')).toEqual({
        start: new Date('2025-10-01T08:00:00.000Z'),
        end: new Date('2025-10-01T08:59:59.999Z'),
      });
    });

    it('should align daily buckets to UTC midnight', () => {
      expect(bucketBounds(ts, 'daily')).toEqual({
        start: new Date('2025-10-01T00:00:00.000Z'),
        end: new Date('2025-10-01T23:59:59.999Z'),
      });
    });

    it('should start weeks on Monday', () => {
      const expected = {
        start: new Date('2025-09-29T00:00:00.000Z'),
        end: new Date('2025-10-05T23:59:59.999Z'),
      };

      expect(bucketBounds(ts, 'weekly')).toEqual(expected);
      expect(bucketBounds(new Date('2025-10-05T23:00:00Z'), 'weekly')).toEqual(
        expected,
      );
    });

    it('should cover whole calendar months across a year end', () => {
      expect(bucketBounds(new Date('2025-12-15T12:00:00Z'), 'monthly')).toEqual({
        start: new Date('2025-12-01T00:00:00.000Z'),
        end: new Date('2025-12-31T23:59:59.999Z'),
      });
    });
  });

  describe('summarizeUsage', () => {
    it('should total, count and locate peak and trough within a day', () => {
      const summary = summarizeUsage(
        usage(
          reading('2025-10-01T08:00:00Z', 10),
          reading('2025-10-01T14:00:00Z', 30),
        ),
      );

      expect(summary.rows).toEqual([
        {
          sourceTag: 'UTILITY1',
          servicePointId: 'SP-1',
          bucketStart: new Date('2025-10-01T00:00:00.000Z'),
          bucketEnd: new Date('2025-10-01T23:59:59.999Z'),
          totalUsage: 40,
          intervalCount: 2,
          peakUsageValue: 30,
          peakUsageTs: new Date('2025-10-01T14:00:00Z'),
          pitUsageValue: 10,
          pitUsageTs: new Date('2025-10-01T08:00:00Z'),
        },
      ]);
    });

    it('should return the ten summary columns and no rows when no timestamp parses', () => {
      const summary = summarizeUsage(
        usage(
          reading(null, 10),
          { ...reading(null, 20), intervalStartTs: 'not a date' },
        ),
      );

      expect(summary.rows).toEqual([]);
      expect(summary.columns).toEqual([...USAGE_SUMMARY_COLUMNS]);
      expect(summary.columns).toHaveLength(10);
    });

    it('should parse textual start timestamps', () => {
      const summary = summarizeUsage(
        usage({ ...reading(null, 4), intervalStartTs: '2025-10-01 08:00:00' }),
      );

      expect(summary.rows[0].bucketStart).toEqual(
        new Date('2025-10-01T00:00:00.000Z'),
      );
    });

    it('should keep the first row on tied extremes', () => {
      const summary = summarizeUsage(
        usage(
          reading('2025-10-01T08:00:00Z', 7),
          reading('2025-10-01T09:00:00Z', 7),
        ),
      );

      expect(summary.rows[0].peakUsageTs).toEqual(new Date('2025-10-01T08:00:00Z'));
      expect(summary.rows[0].pitUsageTs).toEqual(new Date('2025-10-01T08:00:00Z'));
    });

    it('should exclude null values from every aggregate', () => {
      const summary = summarizeUsage(
        usage(
          reading('2025-10-01T08:00:00Z', null),
          reading('2025-10-01T09:00:00Z', 4),
          reading('2025-10-02T08:00:00Z', null),
        ),
      );

      expect(summary.rows).toHaveLength(2);
      expect(summary.rows[0]).toMatchObject({
        totalUsage: 4,
        intervalCount: 1,
        peakUsageValue: 4,
        pitUsageValue: 4,
      });
      expect(summary.rows[1]).toMatchObject({
        bucketStart: new Date('2025-10-02T00:00:00.000Z'),
        totalUsage: 0,
        intervalCount: 0,
        peakUsageValue: null,
        peakUsageTs: null,
        pitUsageValue: null,
        pitUsageTs: null,
      });
    });

    it('should group null identifiers under unknown markers', () => {
      const summary = summarizeUsage(
        usage(
          reading('2025-10-01T08:00:00Z', 1, { servicePointId: null }),
          reading('2025-10-01T09:00:00Z', 2, { sourceTag: null, servicePointId: null }),
        ),
      );

      expect(
        summary.rows.map((r) => [r.sourceTag, r.servicePointId, r.totalUsage]),
      ).toEqual([
        ['UNKNOWN_UTILITY', 'UNKNOWN_SERVICE_POINT', 2],
        ['UTILITY1', 'UNKNOWN_SERVICE_POINT', 1],
      ]);
    });

    it('should order groups by source, service point and bucket', () => {
      const summary = summarizeUsage(
        usage(
          reading('2025-10-02T08:00:00Z', 1, { sourceTag: 'UTILITY2' }),
          reading('2025-10-02T08:00:00Z', 1, { servicePointId: 'SP-2' }),
          reading('2025-10-02T08:00:00Z', 1),
          reading('2025-10-01T08:00:00Z', 1),
        ),
      );

      expect(
        summary.rows.map((r) => [
          r.sourceTag,
          r.servicePointId,
          r.bucketStart.toISOString(),
        ]),
      ).toEqual([
        ['UTILITY1', 'SP-1', '2025-10-01T00:00:00.000Z'],
        ['UTILITY1', 'SP-1', '2025-10-02T00:00:00.000Z'],
        ['UTILITY1', 'SP-2', '2025-10-02T00:00:00.000Z'],
        ['UTILITY2', 'SP-1', '2025-10-02T00:00:00.000Z'],
      ]);
    });

    it('should bucket by the requested window', () => {
      const summary = summarizeUsage(
        usage(
          reading('2025-10-01T08:00:00Z', 10),
          reading('2025-10-01T08:45:00Z', 5),
          reading('2025-10-01T14:00:00Z', 30),
        ),
        'hourly',
      );

      expect(summary.rows.map((r) => [r.totalUsage, r.intervalCount])).toEqual([
        [15, 2],
        [30, 1],
      ]);
    });
  });
});
