import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { join } from 'node:path';
import { createTestApp, FIXTURES_DIR } from './utils/test-app';

/**
 * E2E Tests for PipelineController
 *
 * Runs the real landing loader, adapters and usage stages over the CSV
 * fixtures in test/fixtures/raw.
 */
describe('PipelineController (e2e)', () => {
  let app: INestApplication<App>;

  beforeEach(async () => {
    app = await createTestApp(join(FIXTURES_DIR, 'raw'));
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /health', () => {
    it('should report ok', async () => {
      const response = await request(app.getHttpServer()).get('/health').expect(200);

      expect(response.body).toHaveProperty('status', 'ok');
    });
  });

  describe('GET /pipeline/sources', () => {
    it('should list both utilities', async () => {
      const response = await request(app.getHttpServer())
        .get('/pipeline/sources')
        .expect(200);

      expect(response.body).toMatchObject({
        sources: [
          { name: 'utility1', sourceTag: 'UTILITY1' },
          { name: 'utility2', sourceTag: 'UTILITY2' },
        ],
      });
    });
  });

  describe('GET /pipeline/service-points', () => {
    it('should keep same-named service points of different utilities apart', async () => {
      const response = await request(app.getHttpServer())
        .get('/pipeline/service-points')
        .expect(200);

      expect(response.body).toMatchObject({
        rows: [
          { sourceTag: 'UTILITY1', servicePointId: 'SP-1' },
          { sourceTag: 'UTILITY1', servicePointId: 'SP-2' },
          { sourceTag: 'UTILITY2', servicePointId: 'P-100' },
          { sourceTag: 'UTILITY2', servicePointId: 'SP-1' },
        ],
      });
    });
  });

  describe('GET /pipeline/intervals', () => {
    it('should serialize timestamps as ISO strings', async () => {
      const response = await request(app.getHttpServer())
        .get('/pipeline/intervals')
        .expect(200);

      expect(response.body).toMatchObject({
        rows: expect.arrayContaining([
          expect.objectContaining({
            sourceTag: 'UTILITY2',
            meterId: 'M-500',
            servicePointId: 'P-100',
            intervalStartTs: '2025-10-01T08:15:00.000Z',
            intervalEndTs: '2025-10-01T08:30:00.000Z',
          }),
        ]),
      });
    });
  });

  describe('GET /pipeline/usage', () => {
    it('should mask address fields by default', async () => {
      const response = await request(app.getHttpServer())
        .get('/pipeline/usage')
        .expect(200);

      expect(response.body).toMatchObject({
        accessLevel: 'external',
        rows: expect.arrayContaining([
          expect.objectContaining({
            servicePointId: 'P-100',
            houseNum: '***MASKED***',
            street: '***MASKED***',
            houseSupp: '***MASKED***',
            zip: '142**',
            city: 'Buffalo',
          }),
        ]),
      });
    });

    it('should return raw address fields for internal access', async () => {
      const response = await request(app.getHttpServer())
        .get('/pipeline/usage?access=internal')
        .expect(200);

      expect(response.body).toMatchObject({
        accessLevel: 'internal',
        rows: expect.arrayContaining([
          expect.objectContaining({ servicePointId: 'P-100', street: 'Elm St' }),
        ]),
      });
    });
  });

  describe('repeated query parameters', () => {
    it('should treat a repeated access parameter as external', async () => {
      const response = await request(app.getHttpServer())
        .get('/pipeline/usage?access=internal&access=internal')
        .expect(200);

      expect(response.body).toHaveProperty('accessLevel', 'external');
    });

    it('should return 400 for a repeated window parameter', async () => {
      await request(app.getHttpServer())
        .get('/pipeline/summary?window=daily&window=hourly')
        .expect(400);
    });
  });

  describe('GET /pipeline/summary', () => {
    it('should return the daily summary', async () => {
      const response = await request(app.getHttpServer())
        .get('/pipeline/summary')
        .expect(200);

      expect(response.body).toMatchObject({ window: 'daily' });
      expect(response.body).toHaveProperty('columns', [
        'sourceTag',
        'servicePointId',
        'bucketStart',
        'bucketEnd',
        'totalUsage',
        'intervalCount',
        'peakUsageValue',
        'peakUsageTs',
        'pitUsageValue',
        'pitUsageTs',
      ]);
      expect(response.body).toHaveProperty('rows.0', {
        sourceTag: 'UTILITY1',
        servicePointId: 'SP-1',
        bucketStart: '2025-10-01T00:00:00.000Z',
        bucketEnd: '2025-10-01T23:59:59.999Z',
        totalUsage: 40,
        intervalCount: 2,
        peakUsageValue: 30,
        peakUsageTs: '2025-10-01T14:00:00.000Z',
        pitUsageValue: 10,
        pitUsageTs: '2025-10-01T08:00:00.000Z',
      });
    });

    it('should return 400 for an unsupported window', async () => {
      await request(app.getHttpServer())
        .get('/pipeline/summary?window=fortnightly')
        .expect(400);
    });
  });

  describe('GET /pipeline/data-quality', () => {
    it('should count rows and the orphan reading', async () => {
      const response = await request(app.getHttpServer())
        .get('/pipeline/data-quality')
        .expect(200);

      expect(response.body).toMatchObject({
        rowCounts: { servicePoints: 4, meters: 4, intervals: 6, summary: 4 },
        referentialIntegrity: {
          orphanServicePointIds: [],
          orphanIntervalRows: 1,
          intervalsWithUnknownMeter: 1,
        },
      });
    });
  });

  describe('missing raw files', () => {
    let partialApp: INestApplication<App>;

    beforeEach(async () => {
      partialApp = await createTestApp(join(FIXTURES_DIR, 'raw-partial'));
    });

    afterEach(async () => {
      await partialApp.close();
    });

    it('should return 422 naming the source and table', async () => {
      const response = await request(partialApp.getHttpServer())
        .get('/pipeline/intervals')
        .expect(422);

      expect(response.body).toHaveProperty('statusCode', 422);
      expect(response.body).toHaveProperty(
        'message',
        expect.stringMatching(/^\[utility1\] Raw table "intervals" not found at /),
      );
    });
  });
});
