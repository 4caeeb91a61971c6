import request from 'supertest';
import { createApp } from '@/app';
import { InMemorySessionStore } from '@/memory/InMemorySessionStore';
import { StaticShard, buildOrchestrator, hit } from './helpers/fakes';

describe('chat routes', () => {
  let sessions: InMemorySessionStore;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    sessions = new InMemorySessionStore({ cleanupIntervalMs: 0 });
    const orchestrator = buildOrchestrator({
      sessions,
      shards: [new StaticShard('north', [hit('itm-001', 0.9, { dietary: 'veg', price: 260 })])],
    });
    app = createApp(orchestrator, { nodeEnv: 'test', corsOrigins: ['http://localhost:3000'] });
  });

  afterEach(() => sessions.destroy());

  describe('POST /api/chat', () => {
    it('answers a turn', async () => {
      const res = await request(app).post('/api/chat').send({ sessionId: 's1', message: 'hello' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        data: {
          kind: 'message',
          sessionId: 's1',
          intent: 'greeting',
          message: "Hi! Tell me what you're craving, a dish or a cuisine, and your budget, and I'll find something for you.",
        },
      });
    });

    it('returns ranked dishes for a complete request', async () => {
      const res = await request(app).post('/api/chat').send({ sessionId: 's1', message: 'veg biryani under 300' });

      expect(res.status).toBe(200);
      expect(res.body.data.kind).toBe('recommendations');
      expect(res.body.data.results[0].itemId).toBe('itm-001');
      expect(res.body.data.results[0].metadata.name).toBe('Hyderabadi Veg Dum Biryani');
    });

    it('rejects an empty message', async () => {
      const res = await request(app).post('/api/chat').send({ sessionId: 's1', message: '   ' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        success: false,
        message: 'Invalid request body',
        errors: [{ path: 'message', message: 'Message is required and cannot be empty' }],
      });
    });

    it('rejects a missing session id', async () => {
      const res = await request(app).post('/api/chat').send({ message: 'hello' });
      expect(res.status).toBe(400);
      expect(res.body.errors[0].path).toBe('sessionId');
    });

    it('rejects malformed JSON', async () => {
      const res = await request(app).post('/api/chat').set('Content-Type', 'application/json').send('{"sessionId":');
      expect(res.status).toBe(400);
      expect(res.body.success).toBe(false);
    });

    it('echoes the correlation id', async () => {
      const res = await request(app)
        .post('/api/chat')
        .set('x-correlation-id', 'req-42')
        .send({ sessionId: 's1', message: 'hello' });
      expect(res.headers['x-correlation-id']).toBe('req-42');
    });
  });

  describe('DELETE /api/chat/:sessionId', () => {
    it('ends an existing session', async () => {
      await request(app).post('/api/chat').send({ sessionId: 's1', message: 'hello' });

      const res = await request(app).delete('/api/chat/s1');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, data: { sessionId: 's1', ended: true } });
      expect(sessions.size()).toBe(0);
    });

    it('reports an unknown session', async () => {
      const res = await request(app).delete('/api/chat/nope');
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ success: false, message: 'Session not found' });
    });
  });

  describe('GET /api/chat/:sessionId/history', () => {
    it('lists past searches with a readable time', async () => {
      await request(app).post('/api/chat').send({ sessionId: 's1', message: 'veg biryani under 300' });

      const res = await request(app).get('/api/chat/s1/history');

      expect(res.status).toBe(200);
      expect(res.body.data).toHaveLength(1);
      const [entry] = res.body.data;
      expect(entry).toMatchObject({
        index: 0,
        query: 'biryani',
        resultsCount: 1,
        preview: "Found 1 recommendation for 'biryani'",
      });
      expect(entry.readableTime).toBe(entry.timestamp.slice(0, 19).replace('T', ' '));
    });

    it('returns an empty list before any recommendation', async () => {
      await request(app).post('/api/chat').send({ sessionId: 's1', message: 'hello' });
      const res = await request(app).get('/api/chat/s1/history');
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, data: [] });
    });

    it('reports an unknown session', async () => {
      const res = await request(app).get('/api/chat/nope/history');
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ success: false, message: 'Session not found' });
    });
  });

  describe('GET /api/chat/:sessionId/history/:index', () => {
    it('returns the query, conditions and results of one search', async () => {
      await request(app).post('/api/chat').send({ sessionId: 's1', message: 'veg biryani under 300' });

      const res = await request(app).get('/api/chat/s1/history/0');

      expect(res.status).toBe(200);
      expect(res.body.data.query).toEqual({
        semanticText: 'biryani',
        filters: { dietary: { op: 'eq', value: 'veg' }, price: { op: 'range', max: 300 } },
      });
      expect(res.body.data.conditions.map((c: { name: string }) => c.name)).toEqual([
        'dietary_match',
        'keyword_match',
        'price_fit',
        'similarity',
      ]);
      expect(res.body.data.results).toHaveLength(1);
      expect(res.body.data.results[0]).toMatchObject({ itemId: 'itm-001', name: 'Hyderabadi Veg Dum Biryani', rank: 1 });
    });

    it('answers 404 for an index past the end', async () => {
      await request(app).post('/api/chat').send({ sessionId: 's1', message: 'veg biryani under 300' });
      const res = await request(app).get('/api/chat/s1/history/1');
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ success: false, message: 'Search not found' });
    });

    it('rejects an index that is not a number', async () => {
      const res = await request(app).get('/api/chat/s1/history/first');
      expect(res.status).toBe(400);
      expect(res.body.message).toBe('Invalid history index');
      expect(res.body.errors[0].path).toBe('index');
    });
  });

  it('reports health with the session count', async () => {
    await request(app).post('/api/chat').send({ sessionId: 's1', message: 'hello' });

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'OK', environment: 'test', activeSessions: 1 });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/api/unknown');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, message: 'Route GET /api/unknown not found' });
  });
});
