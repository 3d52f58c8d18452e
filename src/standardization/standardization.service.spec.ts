import { Test, TestingModule } from '@nestjs/testing';
import { StandardizationService } from './standardization.service';
import { Utility1Adapter } from './adapters/utility1.adapter';
import { Utility2Adapter } from './adapters/utility2.adapter';
import { SourceDataError } from './interfaces/source-adapter.interface';
import {
  INTERVAL_COLUMNS,
  METER_COLUMNS,
  SERVICE_POINT_COLUMNS,
} from './dto/canonical.dto';
import { RawDataset } from './interfaces/raw-table.interface';
import { defaultRawDataset, utility2Csv } from '../../test/utils/mock-data';
import { emptyDataset } from '../../test/utils/test-helpers';

describe('StandardizationService', () => {
  let service: StandardizationService;
  let raw: RawDataset;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [StandardizationService, Utility1Adapter, Utility2Adapter],
    }).compile();

    service = module.get<StandardizationService>(StandardizationService);
    raw = defaultRawDataset();
  });

  describe('getSupportedSources', () => {
    it('should list adapters in registration order', () => {
      expect(service.getSupportedSources().map((s) => s.name)).toEqual([
        'utility1',
        'utility2',
      ]);
    });
  });

  describe('standardizeServicePoints', () => {
    it('should combine both utilities with the canonical columns', () => {
      const table = service.standardizeServicePoints(raw);

      expect(table.columns).toEqual([...SERVICE_POINT_COLUMNS]);
      expect(table.rows.map((r) => [r.sourceTag, r.servicePointId])).toEqual([
        ['UTILITY1', 'SP-1'],
        ['UTILITY1', 'SP-2'],
        ['UTILITY2', 'P-100'],
        ['UTILITY2', 'SP-1'],
      ]);
    });

    it('should never emit a null service point id or a duplicate key', () => {
      const table = service.standardizeServicePoints(raw);
      const keys = table.rows.map((r) => `${r.sourceTag}|${r.servicePointId}`);

      expect(table.rows.every((r) => r.servicePointId !== null)).toBe(true);
      expect(new Set(keys).size).toBe(keys.length);
    });
  });

  describe('standardizeMeters', () => {
    it('should collapse repeated meter rows per utility', () => {
      const table = service.standardizeMeters(raw);

      expect(table.columns).toEqual([...METER_COLUMNS]);
      expect(table.rows.map((r) => [r.sourceTag, r.meterId])).toEqual([
        ['UTILITY1', 'MTR-1'],
        ['UTILITY1', 'MTR-2'],
        ['UTILITY2', 'M-500'],
        ['UTILITY2', 'M-501'],
      ]);
    });
  });

  describe('standardizeIntervals', () => {
    it('should link utility 2 readings to premises through their meters', () => {
      const table = service.standardizeIntervals(raw);
      const utility2 = table.rows.filter((r) => r.sourceTag === 'UTILITY2');

      expect(utility2.map((r) => [r.meterId, r.servicePointId])).toEqual([
        ['M-500', 'P-100'],
        ['M-500', 'P-100'],
        ['M-999', null],
      ]);
    });

    it('should keep the first of two readings with the same natural key', () => {
      const table = service.standardizeIntervals(raw);
      const utility1 = table.rows.filter((r) => r.sourceTag === 'UTILITY1');

      expect(table.columns).toEqual([...INTERVAL_COLUMNS]);
      expect(utility1.map((r) => r.value)).toEqual([10, 30, 5]);
    });

    it('should hold end = start + duration for every reading', () => {
      const table = service.standardizeIntervals(raw);

      for (const row of table.rows) {
        if (row.intervalStartTs && row.intervalEndTs && row.durationSeconds !== null) {
          expect(
            (row.intervalEndTs.getTime() - row.intervalStartTs.getTime()) / 1000,
          ).toBe(row.durationSeconds);
        }
      }
    });

    it('should only reference known meters when the raw input is consistent', () => {
      raw.utility2.intervals = utility2Csv.intervals(
        ['1', '900', 'M-500', 'A', '20251001T080000', '2.5'],
        ['1', '900', 'M-501', 'A', '20251001T080000', '4'],
      );

      const meters = service.standardizeMeters(raw);
      const intervals = service.standardizeIntervals(raw, meters);
      const meterKeys = new Set(meters.rows.map((m) => `${m.sourceTag}|${m.meterId}`));

      for (const row of intervals.rows) {
        expect(meterKeys.has(`${row.sourceTag}|${row.meterId}`)).toBe(true);
      }
    });
  });

  describe('standardize', () => {
    it('should return all three tables', () => {
      const result = service.standardize(raw);

      expect(result.servicePoints.rows).toHaveLength(4);
      expect(result.meters.rows).toHaveLength(4);
      expect(result.intervals.rows).toHaveLength(6);
    });

    it('should produce empty tables with full schemas for empty input', () => {
      const result = service.standardize(emptyDataset(raw));

      expect(result.servicePoints.rows).toEqual([]);
      expect(result.servicePoints.columns).toEqual([...SERVICE_POINT_COLUMNS]);
      expect(result.meters.rows).toEqual([]);
      expect(result.intervals.rows).toEqual([]);
      expect(result.intervals.columns).toEqual([...INTERVAL_COLUMNS]);
    });

    it('should abort when a registered source is missing a table', () => {
      delete raw.utility2.meters;

      expect(() => service.standardize(raw)).toThrow(SourceDataError);
      expect(() => service.standardize(raw)).toThrow(
        '[utility2] Missing raw table "meters"',
      );
    });

    it('should ignore raw data of unregistered sources', () => {
      raw.utility9 = { servicePoints: { columns: ['x'], rows: [{ x: '1' }] } };

      expect(service.standardize(raw).servicePoints.rows).toHaveLength(4);
    });
  });
});
