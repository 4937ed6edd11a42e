import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../../src/app.module';
import { setupOpenApi } from '../../src/infrastructure/docs/openapi';
import {
  WinstonLoggerAdapter,
} from '../../src/infrastructure/logging/winston-logger.adapter';
import { FixedClock } from '../fakes/fixed-clock';
import {
  accessDenied,
  InMemoryObjectStorage,
} from '../fakes/in-memory-object-storage';
import { at, HOUR_MS, MINUTE_MS, objectRecord, T0 } from '../fakes/objects';

describe('Bucket health API (e2e)', () => {
  let app: NestFastifyApplication;
  let storage: InMemoryObjectStorage;

  const newestObject = {
    key: 'b',
    last_modified: '2024-05-01T01:00:00.000Z',
    age_seconds: 3900,
  };

  const get = (path: string) => request(app.getHttpServer()).get(path);

  beforeAll(async () => {
    process.env.LOG_ENABLE_FILES = 'false';
    process.env.LOG_ENABLE_CONSOLE = 'false';
    process.env.METRICS_DEFAULT_COLLECTORS = 'false';

    storage = new InMemoryObjectStorage()
      .withObjects(
        'reports',
        [objectRecord('a', 100, T0), objectRecord('b', 200, at(HOUR_MS))],
        1,
      )
      .withPages('empty', [])
      .withObjects('locked', [])
      .failListing('locked', accessDenied('ListObjects'));

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider('IObjectStorage')
      .useValue(storage)
      .overrideProvider('IClock')
      .useValue(new FixedClock(at(2 * HOUR_MS + 5 * MINUTE_MS)))
      .compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(
      new FastifyAdapter(),
    );
    app.useLogger(app.get(WinstonLoggerAdapter));
    setupOpenApi(app);
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('GET /buckets/:bucketName/freshness', () => {
    it('passes when the newest object is within max_age', async () => {
      const response = await get('/buckets/reports/freshness?max_age=2h')
        .expect(200);

      expect(response.body).toEqual({
        status: 'ok',
        bucket: 'reports',
        newest_object: newestObject,
        max_age_seconds: 7200,
      });
    });

    it('fails when the newest object is older than max_age', async () => {
      const response = await get('/buckets/reports/freshness?max_age=30m')
        .expect(500);

      expect(response.body).toEqual({
        status: 'fail',
        reason:
          'Newest object is too old (3900 seconds, max age: 1800 seconds)',
        newest_object: newestObject,
        max_age_seconds: 1800,
      });
    });

    it('reports the newest object without max_age', async () => {
      const response = await get('/buckets/reports/freshness').expect(200);

      expect(response.body).toEqual({
        status: 'ok',
        bucket: 'reports',
        newest_object: newestObject,
      });
    });

    it('applies the 24h default to an empty max_age', async () => {
      const response = await get('/buckets/reports/freshness?max_age=')
        .expect(200);

      expect(response.body.max_age_seconds).toBe(86400);
    });

    it('rejects a malformed max_age with 400', async () => {
      const response = await get('/buckets/reports/freshness?max_age=5x')
        .expect(400);

      expect(response.body).toEqual({
        status: 'fail',
        reason:
          "Invalid duration format: 5x. Use format like '24h', '60m', or '2d'",
      });
    });

    it('fails for an empty bucket', async () => {
      const response = await get('/buckets/empty/freshness?max_age=1h')
        .expect(500);

      expect(response.body).toEqual({
        status: 'fail',
        reason: "Bucket 'empty' is empty",
      });
    });

    it('explains a missing list permission', async () => {
      const response = await get('/buckets/locked/freshness').expect(500);

      expect(response.body).toEqual({
        status: 'fail',
        reason:
          "Cannot check newest object age. The 's3:ListBucket' permission is required.",
      });
    });

    it('passes backend errors through', async () => {
      const response = await get('/buckets/missing/freshness').expect(500);

      expect(response.body).toEqual({
        status: 'fail',
        reason: 'Error accessing bucket: The specified bucket does not exist',
      });
    });
  });

  describe('GET /buckets/:bucketName/usage', () => {
    it('reports object count and size across pages', async () => {
      const response = await get('/buckets/reports/usage').expect(200);

      expect(response.body).toEqual({
        status: 'ok',
        bucket: 'reports',
        usage: {
          object_count: 2,
          total_size_bytes: 300,
          total_size_formatted: '0.00 MB',
        },
      });
    });

    it('reports an empty bucket as zero usage', async () => {
      const response = await get('/buckets/empty/usage').expect(200);

      expect(response.body.usage).toEqual({
        object_count: 0,
        total_size_bytes: 0,
        total_size_formatted: '0.00 MB',
      });
    });

    it('explains a missing list permission', async () => {
      const response = await get('/buckets/locked/usage').expect(500);

      expect(response.body).toEqual({
        status: 'fail',
        reason:
          "Cannot check bucket usage. The 's3:ListBucket' permission is required.",
      });
    });
  });

  it('GET /health', async () => {
    const response = await get('/health').expect(200);

    expect(response.body.status).toBe('ok');
    expect(response.body.service).toBe('bucket-health');
  });

  it('GET /metrics counts inspections', async () => {
    const response = await get('/metrics').expect(200);

    expect(response.text).toContain(
      'bucket_inspections_total{operation="usage",outcome="ok"} 2',
    );
  });

  it('GET /openapi.json describes the API', async () => {
    const response = await get('/openapi.json').expect(200);

    expect(response.body.info).toMatchObject({
      title: 'S3 Health Check API',
      version: '1.0.0',
    });
    expect(Object.keys(response.body.paths)).toEqual(
      expect.arrayContaining([
        '/buckets/{bucketName}/freshness',
        '/buckets/{bucketName}/usage',
      ]),
    );
  });

  it('GET /redoc serves ReDoc over the OpenAPI document', async () => {
    const response = await get('/redoc').expect(200);

    expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(response.text).toContain(
      '<redoc spec-url="/openapi.json"></redoc>',
    );
  });

  it('renders unknown routes in the failure envelope', async () => {
    const response = await get('/nowhere').expect(404);

    expect(response.body).toEqual({
      status: 'fail',
      reason: 'Cannot GET /nowhere',
    });
  });
});
