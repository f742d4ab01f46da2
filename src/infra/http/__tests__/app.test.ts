import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import request from 'supertest';
import { createTestApp, type TestApp } from './testApp.js';

describe('app', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await createTestApp();
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('GET /healthz', () => {
    it('should answer 200 when the database responds', async () => {
      const res = await request(ctx.app).get('/healthz');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ok' });
    });

    it('should answer 500 when the database fails', async () => {
      vi.spyOn(ctx.pool, 'query').mockRejectedValueOnce(new Error('connection refused'));

      const res = await request(ctx.app).get('/healthz');

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
    });
  });

  it('should serve the OpenAPI document', async () => {
    const res = await request(ctx.app).get('/docs.json');

    expect(res.status).toBe(200);
    expect(res.body.info.title).toBe('Password Vault API');
  });

  it('should rate limit requests per client', async () => {
    const limited = await createTestApp(2);

    expect((await request(limited.app).get('/api/folders')).status).toBe(200);
    expect((await request(limited.app).get('/api/folders')).status).toBe(200);
    expect((await request(limited.app).get('/api/folders')).status).toBe(429);
  });
});
