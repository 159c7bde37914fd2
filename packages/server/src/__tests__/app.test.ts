import { describe, it, expect, vi, afterEach } from 'vitest';
import request from 'supertest';
import type { Logger } from '@docwriter/core';
import { createTestApp, TEST_PASSWORD, type TestApp } from './helpers.js';

describe('createApp', () => {
  let ctx: TestApp | undefined;

  afterEach(async () => {
    await ctx?.cleanup();
    ctx = undefined;
  });

  describe('GET /health', () => {
    it('answers without starting a session', async () => {
      ctx = await createTestApp({ password: TEST_PASSWORD });

      const res = await request(ctx.app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
      expect(typeof res.body.timestamp).toBe('number');
      expect(res.headers['set-cookie']).toBeUndefined();
    });
  });

  describe('authentication', () => {
    it('is open when no password is configured', async () => {
      ctx = await createTestApp();

      const session = await request(ctx.app).get('/session');
      expect(session.body).toEqual({ authenticated: true, passwordRequired: false, timeoutMinutes: 60 });

      const templates = await request(ctx.app).get('/templates');
      expect(templates.status).toBe(200);
    });

    it('rejects protected routes before login', async () => {
      ctx = await createTestApp({ password: TEST_PASSWORD });

      const res = await request(ctx.app).get('/templates');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Authentication required' });
    });

    it('rejects a wrong password and logs the attempt', async () => {
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      ctx = await createTestApp({ password: TEST_PASSWORD, logger });

      const res = await request(ctx.app).post('/login').send({ password: 'wrong' });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Invalid password' });
      expect(logger.warn).toHaveBeenCalledWith('Failed login attempt', expect.any(Object));
    });

    it('keeps the session authenticated after login', async () => {
      ctx = await createTestApp({ password: TEST_PASSWORD });
      const agent = request.agent(ctx.app);

      const login = await agent.post('/login').send({ password: TEST_PASSWORD });
      expect(login.status).toBe(200);
      expect(login.body).toEqual({ authenticated: true, passwordRequired: true });

      const session = await agent.get('/session');
      expect(session.body).toEqual({ authenticated: true, passwordRequired: true, timeoutMinutes: 60 });

      const templates = await agent.get('/templates');
      expect(templates.status).toBe(200);
    });

    it('ends the session on logout', async () => {
      ctx = await createTestApp({ password: TEST_PASSWORD });
      const agent = request.agent(ctx.app);
      await agent.post('/login').send({ password: TEST_PASSWORD }).expect(200);

      const logout = await agent.post('/logout');
      expect(logout.body).toEqual({ authenticated: false });

      const res = await agent.get('/templates');
      expect(res.status).toBe(401);
    });

    it('slides the inactivity window and expires idle sessions', async () => {
      ctx = await createTestApp({ password: TEST_PASSWORD, sessionTimeoutMinutes: 60 });
      const agent = request.agent(ctx.app);
      await agent.post('/login').send({ password: TEST_PASSWORD }).expect(200);

      ctx.clock.now += 59 * 60_000;
      await agent.get('/templates').expect(200);

      ctx.clock.now += 59 * 60_000;
      await agent.get('/templates').expect(200);

      ctx.clock.now += 61 * 60_000;
      const res = await agent.get('/templates');
      expect(res.status).toBe(401);
    });

    it('does not start a session for anonymous reads', async () => {
      ctx = await createTestApp();

      const session = await request(ctx.app).get('/session');
      const templates = await request(ctx.app).get('/templates');
      const missing = await request(ctx.app).get('/nope');

      expect(session.headers['set-cookie']).toBeUndefined();
      expect(templates.headers['set-cookie']).toBeUndefined();
      expect(missing.status).toBe(404);
      expect(missing.headers['set-cookie']).toBeUndefined();
    });

    it('reports an anonymous browser as logged out when a password is set', async () => {
      ctx = await createTestApp({ password: TEST_PASSWORD });

      const res = await request(ctx.app).get('/session');

      expect(res.body).toEqual({ authenticated: false, passwordRequired: true, timeoutMinutes: 60 });
      expect(res.headers['set-cookie']).toBeUndefined();
    });

    it('starts a session on the first state-changing request', async () => {
      ctx = await createTestApp({ password: TEST_PASSWORD });

      const res = await request(ctx.app).post('/login').send({ password: 'wrong' });

      expect(res.status).toBe(401);
      expect(res.headers['set-cookie']?.[0]).toMatch(/^docwriter_session=s%3A/);
    });

    it('logs out the least recently active browser past the session cap', async () => {
      ctx = await createTestApp({ password: TEST_PASSWORD, maxSessions: 2 });
      const first = request.agent(ctx.app);
      const second = request.agent(ctx.app);
      const third = request.agent(ctx.app);

      await first.post('/login').send({ password: TEST_PASSWORD }).expect(200);
      await second.post('/login').send({ password: TEST_PASSWORD }).expect(200);
      await third.post('/login').send({ password: TEST_PASSWORD }).expect(200);

      expect((await first.get('/templates')).status).toBe(401);
      expect((await second.get('/templates')).status).toBe(200);
      expect((await third.get('/templates')).status).toBe(200);
    });

    it('ignores a forged session cookie', async () => {
      ctx = await createTestApp({ password: TEST_PASSWORD });

      const res = await request(ctx.app)
        .get('/templates')
        .set('Cookie', 'docwriter_session=s%3Aforged.signature');

      expect(res.status).toBe(401);
    });
  });

  describe('GET /templates', () => {
    it('lists templates, tones and defaults', async () => {
      ctx = await createTestApp();

      const res = await request(ctx.app).get('/templates');

      expect(res.body.templates).toHaveLength(8);
      expect(res.body.templates[1]).toMatchObject({ name: 'memo', displayName: 'Memo' });
      expect(res.body.defaultTemplate).toBe('general');
      expect(res.body.tones).toContain(res.body.defaultTone);
    });
  });

  describe('GET /diagnostics', () => {
    it('reports component health', async () => {
      ctx = await createTestApp();

      const res = await request(ctx.app).get('/diagnostics');

      expect(res.status).toBe(200);
      expect(res.body.health.healthy).toBe(true);
      expect(res.body.health.provider.model).toBe('stub-model');
      expect(res.body.diagnostics.templates.count).toBe(8);
      expect(res.body.diagnostics.drafts.count).toBe(0);
    });
  });

  describe('request limits', () => {
    it('rejects oversized bodies with 413', async () => {
      ctx = await createTestApp();

      const res = await request(ctx.app)
        .post('/generate')
        .send({ notes: 'x'.repeat(300 * 1024) });

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: 'Request body too large' });
    });

    it('rejects malformed JSON with 400', async () => {
      ctx = await createTestApp();

      const res = await request(ctx.app)
        .post('/generate')
        .set('Content-Type', 'application/json')
        .send('{"notes": ');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Bad request' });
    });

    it('rejects fields over their length limit', async () => {
      ctx = await createTestApp();

      const res = await request(ctx.app)
        .post('/generate')
        .send({ notes: 'x'.repeat(10_001) });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Invalid request');
      expect(res.body.details[0]).toMatch(/^notes: /);
      expect(ctx.provider.requests).toHaveLength(0);
    });

    it('rate limits state-changing routes', async () => {
      ctx = await createTestApp({ rateLimit: { windowMs: 60_000, limit: 2 } });

      await request(ctx.app).post('/login').send({ password: '' }).expect(200);
      await request(ctx.app).post('/login').send({ password: '' }).expect(200);
      const res = await request(ctx.app).post('/login').send({ password: '' });

      expect(res.status).toBe(429);
      expect(res.body).toEqual({ error: 'Too many requests, please slow down' });
    });
  });

  describe('error handling', () => {
    it('answers unknown routes with 404', async () => {
      ctx = await createTestApp();

      const res = await request(ctx.app).get('/nope');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Not found' });
    });

    it('hides unexpected errors behind a 500 and logs them', async () => {
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      ctx = await createTestApp({ logger });
      vi.spyOn(ctx.client, 'listDrafts').mockRejectedValue(new Error('disk on fire'));

      const res = await request(ctx.app).get('/drafts');

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'Internal server error' });
      expect(logger.error).toHaveBeenCalledWith(
        'Unhandled error',
        expect.objectContaining({ method: 'GET', path: '/drafts', error: 'disk on fire' })
      );
    });
  });
});
