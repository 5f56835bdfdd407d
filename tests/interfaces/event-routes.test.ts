import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTestApp } from './app.js';

describe('event routes', () => {
  let ctx: Awaited<ReturnType<typeof buildTestApp>>;

  beforeEach(async () => {
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  // ─── POST /api/v1/events ───────────────────────────────────

  describe('POST /api/v1/events', () => {
    it('appends a valid event and returns 201 with its id', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/v1/events',
        payload: {
          event_type: 'post_published',
          object_id: 10,
          event_data: { action: 'published', object: { type: 'post', title: 'Launch' } },
        },
      });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toEqual({ event_id: 1 });
      expect((await ctx.storage.events.listByReport(null))[0]?.object_id).toBe('10');
    });

    it('returns 400 with issues for an invalid body', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/api/v1/events',
        payload: { event_data: {} },
      });

      expect(res.statusCode).toBe(400);
      const body = res.json();
      expect(body.error).toBe('Validation failed');
      expect(body.issues[0].path).toEqual(['event_type']);
    });
  });

  // ─── GET /api/v1/events ────────────────────────────────────

  describe('GET /api/v1/events', () => {
    beforeEach(async () => {
      await ctx.storage.events.append({ event_type: 'a', event_timestamp: new Date('2026-03-01T10:00:00Z') });
      await ctx.storage.events.append({ event_type: 'b', event_timestamp: new Date('2026-03-01T11:00:00Z') });
    });

    it('lists unassigned events newest first', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/v1/events?limit=1' });

      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.pagination).toEqual({ limit: 1, offset: 0, count: 1 });
      expect(body.data[0].event_type).toBe('b');
      expect(body.data[0].event_timestamp).toBe('2026-03-01T11:00:00.000Z');
    });

    it('filters by report_id', async () => {
      await ctx.storage.events.claimForPeriod(
        9,
        new Date('2026-03-01T00:00:00Z'),
        new Date('2026-03-01T10:30:00Z'),
      );

      const res = await ctx.app.inject({ method: 'GET', url: '/api/v1/events?report_id=9' });

      expect(res.json().data.map((event: { event_type: string }) => event.event_type)).toEqual(['a']);
    });

    it('rejects a non-integer limit', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/v1/events?limit=many' });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'limit must be an integer' });
    });

    it('rejects a malformed report_id', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/v1/events?report_id=0' });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: 'report_id must be a positive integer' });
    });
  });

  // ─── recent / counts / last ────────────────────────────────

  describe('GET /api/v1/events/recent', () => {
    it('returns the newest unassigned events', async () => {
      for (let hour = 1; hour <= 7; hour++) {
        await ctx.storage.events.append({ event_type: `t${hour}`, event_timestamp: new Date(Date.UTC(2026, 2, 1, hour)) });
      }

      const res = await ctx.app.inject({ method: 'GET', url: '/api/v1/events/recent' });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.map((event: { event_type: string }) => event.event_type))
        .toEqual(['t7', 't6', 't5', 't4', 't3']);
    });
  });

  describe('GET /api/v1/events/counts', () => {
    it('counts unassigned events by type', async () => {
      await ctx.storage.events.append({ event_type: 'a' });
      await ctx.storage.events.append({ event_type: 'a' });

      const res = await ctx.app.inject({ method: 'GET', url: '/api/v1/events/counts' });

      expect(res.json()).toEqual({ report_id: null, totals: { a: 2 } });
    });
  });

  describe('GET /api/v1/events/last', () => {
    it('returns the newest event for the object', async () => {
      const id = await ctx.storage.events.append({ event_type: 'post_edited', object_id: '5' });

      const res = await ctx.app.inject({
        method: 'GET',
        url: '/api/v1/events/last?event_type=post_edited&object_id=5',
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().id).toBe(id);
    });

    it('returns 404 when the object has no events', async () => {
      const res = await ctx.app.inject({
        method: 'GET',
        url: '/api/v1/events/last?event_type=post_edited&object_id=5',
      });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'Event not found' });
    });

    it('requires both parameters', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/api/v1/events/last?event_type=post_edited' });

      expect(res.statusCode).toBe(400);
    });
  });
});
