import { AttemptConnectionError } from '@infra/http-transport/transport.errors';
import { HttpStatus } from '@nestjs/common';
import request from 'supertest';
import { proxy } from '@test/utils/configs';
import { DIRECT, FakeHttpTransport } from '@test/utils/fake-http-transport';
import {
  closeTestApp,
  createTestApp,
  TestAppContext,
} from './utils/create-test-app.util';

const ENV: Record<string, string> = {
  PROXIES: '10.0.0.1:8080,10.0.0.2:8080,10.0.0.3:8080',
  PROXY_PROBE_URL: 'http://echo.test/ip',
  PROXY_FAST_START_TIMEOUT_MS: '200',
  PROXY_SWEEP_ENABLED: 'false',
  PROXY_REPORT_INTERVAL_MS: '0',
  DISPATCH_ATTEMPT_TIMEOUT_MS: '200',
  DISPATCH_BACKOFF_MIN_MS: '0',
  DISPATCH_BACKOFF_MAX_MS: '0',
  CONTENT_SEARCH_URL: 'https://search.test/',
  CONTENT_READER_URL: 'https://reader.test/',
};

describe('Egress relay (e2e)', () => {
  const previousEnv = { ...process.env };
  let testContext: TestAppContext;

  beforeAll(async () => {
    Object.assign(process.env, ENV);
    delete process.env.PROXIES_FILE;
    delete process.env.CONTENT_API_KEY;

    const transport = new FakeHttpTransport()
      .reply(proxy(2), 502)
      .reply(proxy(3), new AttemptConnectionError('connect ECONNREFUSED'));
    testContext = await createTestApp(transport);
  });

  afterAll(async () => {
    await closeTestApp(testContext);
    process.env = previousEnv;
  });

  describe('Health Check', () => {
    it('should return liveness text', async () => {
      await request(testContext.app.getHttpServer())
        .get('/health/check')
        .expect(HttpStatus.OK)
        .expect('I am ok');
    });

    it('should be healthy after fast start confirmed one proxy', async () => {
      const response = await request(testContext.app.getHttpServer())
        .get('/health')
        .expect(HttpStatus.OK);

      expect(response.body.status).toBe('healthy');
      expect(response.body.stats.pool).toMatchObject({
        totalCandidates: 3,
        workingCount: 1,
        failedCount: 2,
        untestedCount: 0,
      });
    });
  });

  describe('Search', () => {
    it('should fetch through the working proxy', async () => {
      const response = await request(testContext.app.getHttpServer())
        .post('/search')
        .send({ query: '  proxy pools ' })
        .expect(HttpStatus.OK);

      expect(response.body).toMatchObject({
        success: true,
        query: 'proxy pools',
        content: 'status 200',
        statusCode: 200,
        source: 'search',
        via: 'proxy',
      });
      const sent = testContext.transport.requests.at(-1);
      expect(sent?.url).toBe('https://search.test/?q=proxy+pools');
      expect(testContext.transport.routesUsed().at(-1)).toBe('http://10.0.0.1:8080');
    });

    it('should reject a blank query', async () => {
      const response = await request(testContext.app.getHttpServer())
        .post('/search')
        .send({ query: '   ' })
        .expect(HttpStatus.BAD_REQUEST);

      expect(response.body).toMatchObject({
        success: false,
        code: 'ERR_VALIDATION_FAILED',
      });
    });

    it('should reject a missing body', async () => {
      await request(testContext.app.getHttpServer())
        .post('/search')
        .expect(HttpStatus.BAD_REQUEST);
    });
  });

  describe('Read', () => {
    it('should reject a non-http url', async () => {
      const response = await request(testContext.app.getHttpServer())
        .post('/read')
        .send({ url: 'ftp://example.com' })
        .expect(HttpStatus.BAD_REQUEST);

      expect(response.body.payload).toEqual({
        fields: [
          {
            field: 'url',
            problems: ['url must start with http:// or https://'],
          },
        ],
      });
    });

    it('should answer 502 when every attempt fails', async () => {
      testContext.transport.reply(proxy(1), 503).reply(null, 503);

      const response = await request(testContext.app.getHttpServer())
        .post('/read')
        .send({ url: 'https://example.com' })
        .expect(HttpStatus.BAD_GATEWAY);

      expect(response.body).toMatchObject({
        success: false,
        code: 'ERR_CONTENT_UNAVAILABLE',
        payload: {
          source: 'reader',
          target: 'https://reader.test/https://example.com',
          errorKind: 'AllAttemptsExhausted',
          attempts: 4,
          statusCode: 503,
        },
      });
      expect(testContext.transport.routesUsed().slice(-4)).toEqual([
        'http://10.0.0.1:8080',
        'http://10.0.0.1:8080',
        'http://10.0.0.1:8080',
        DIRECT,
      ]);
    });
  });

  describe('Status', () => {
    it('should describe the service', async () => {
      const response = await request(testContext.app.getHttpServer())
        .get('/')
        .expect(HttpStatus.OK);

      expect(Object.keys(response.body.endpoints)).toEqual([
        '/',
        '/search',
        '/read',
        '/health',
        '/stats',
      ]);
    });

    it('should list working proxies', async () => {
      const response = await request(testContext.app.getHttpServer())
        .get('/stats')
        .expect(HttpStatus.OK);

      expect(response.body.proxyDetails.workingProxies).toEqual([
        'http://10.0.0.1:8080',
      ]);
      expect(response.body.serviceStats.totalRequests).toBe(2);
    });

    it('should list endpoints for an unknown route', async () => {
      const response = await request(testContext.app.getHttpServer())
        .get('/nowhere')
        .expect(HttpStatus.NOT_FOUND);

      expect(response.body).toMatchObject({
        success: false,
        error: 'Endpoint not found',
        availableEndpoints: ['/', '/search', '/read', '/health', '/stats'],
      });
    });
  });
});
