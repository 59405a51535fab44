import request from 'supertest';
import { RequestRateLimiter } from '../../src/api/middleware/rateLimit';
import { createFakeNbaClient } from '../mocks/dataSource.mock';
import { createFakeCalendarService, createTestApp, silenceConsole } from '../mocks/app.mock';

describe('App', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should describe the API at the root', async () => {
    const response = await request(createTestApp())
      .get('/')
      .expect(200);

    expect(response.body).toEqual({
      message: 'Welcome to the NBA Player Analysis API',
      docs_url: '/docs',
      version: '0.1.0',
    });
  });

  it('should report health with the state of each dependency', async () => {
    const response = await request(createTestApp({ nbaClient: createFakeNbaClient() }))
      .get('/health')
      .expect(200);

    expect(response.body).toMatchObject({
      status: 'ok',
      message: 'NBA Player Analysis API is healthy',
      timestamp: '2026-10-18T12:00:00.000Z',
      environment: 'test',
      version: '0.1.0',
      services: {
        balldontlie: { configured: true },
        cache: { driver: 'memory' },
        calendar: { authenticated: true },
      },
    });
    expect(typeof response.body.uptime).toBe('number');
  });

  it('should report a degraded service without an API key', async () => {
    const response = await request(createTestApp({
      nbaClient: null,
      cacheDriver: 'file',
      calendarService: createFakeCalendarService(false),
    }))
      .get('/health')
      .expect(200);

    expect(response.body.status).toBe('degraded');
    expect(response.body.message).toBe('NBA Player Analysis API is running without a BallDontLie API key');
    expect(response.body.services).toEqual({
      balldontlie: { configured: false },
      cache: { driver: 'file' },
      calendar: { authenticated: false },
    });
  });

  it('should return 404 for unknown routes', async () => {
    const response = await request(createTestApp())
      .get('/nonexistent-route')
      .expect(404);

    expect(response.body.error).toEqual({
      message: 'Route GET /nonexistent-route not found',
      code: 'NOT_FOUND',
    });
  });

  it('should allow any origin by default', async () => {
    const response = await request(createTestApp())
      .get('/')
      .set('Origin', 'http://localhost:5173')
      .expect(200);

    expect(response.headers['access-control-allow-origin']).toBe('*');
  });

  it('should echo a configured origin', async () => {
    const response = await request(createTestApp({ corsOrigins: ['http://localhost:5173'] }))
      .get('/')
      .set('Origin', 'http://localhost:5173')
      .expect(200);

    expect(response.headers['access-control-allow-origin']).toBe('http://localhost:5173');
  });

  it('should throttle clients over the request limit', async () => {
    const app = createTestApp({
      rateLimiter: new RequestRateLimiter({ maxRequests: 2, windowMs: 60_000 }),
    });

    await request(app).get('/').expect(200);
    await request(app).get('/').expect(200);
    const response = await request(app).get('/').expect(429);

    expect(response.body).toEqual({ message: 'Rate limit exceeded. Please try again later.' });
  });
});
