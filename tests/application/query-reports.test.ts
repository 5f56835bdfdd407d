import { describe, it, expect, beforeEach } from 'vitest';
import {
  listFrozenReports,
  getReportEvents,
  getActiveReportSnapshot,
  acknowledgeDelivery,
} from '../../src/application/query-reports.js';
import { listEvents, listRecentEvents } from '../../src/application/query-events.js';
import { ReportLifecycle } from '../../src/application/report-lifecycle.js';
import { InMemoryReportingStorage } from '../../src/infrastructure/memory/index.js';
import { fakeLogger, fixedClock, TEST_LABELS } from '../helpers.js';

describe('report queries', () => {
  let clock: ReturnType<typeof fixedClock>;
  let storage: InMemoryReportingStorage;
  let lifecycle: ReportLifecycle;

  beforeEach(() => {
    clock = fixedClock('2026-03-01T00:00:00Z');
    storage = new InMemoryReportingStorage({ now: clock.now });
    lifecycle = new ReportLifecycle({
      storage,
      labels: TEST_LABELS,
      narrative: null,
      log: fakeLogger(),
      now: clock.now,
    });
  });

  async function freezeWith(types: string[]): Promise<number> {
    await lifecycle.getOrCreateActiveReport();
    for (const event_type of types) {
      await storage.events.append({ event_type, event_timestamp: clock.now() });
    }
    clock.advance(60_000);
    return lifecycle.freezeCurrentReport();
  }

  describe('listFrozenReports', () => {
    it('returns frozen reports newest first with pagination info', async () => {
      const first = await freezeWith(['post_published']);
      const second = await freezeWith([]);

      const result = await listFrozenReports(storage, {});

      expect(result.data.map((report) => report.id)).toEqual([second, first]);
      expect(result.pagination).toEqual({ limit: 20, offset: 0, count: 2 });
    });

    it('clamps limit to [1, 100]', async () => {
      expect((await listFrozenReports(storage, { limit: 0 })).pagination.limit).toBe(1);
      expect((await listFrozenReports(storage, { limit: 1000 })).pagination.limit).toBe(100);
      expect((await listFrozenReports(storage, { offset: -5 })).pagination.offset).toBe(0);
    });
  });

  describe('getReportEvents', () => {
    it('returns the events claimed by a report', async () => {
      const id = await freezeWith(['post_published', 'comment_posted']);

      const events = await getReportEvents(storage, id);

      expect(events?.map((event) => event.report_id)).toEqual([id, id]);
    });

    it('returns null for an unknown report', async () => {
      expect(await getReportEvents(storage, 404)).toBeNull();
    });
  });

  describe('getActiveReportSnapshot', () => {
    it('self-heals a missing active report and counts pending events', async () => {
      await storage.events.append({ event_type: 'post_published' });
      await storage.events.append({ event_type: 'post_published' });
      await storage.events.append({ event_type: 'user_registered' });

      const snapshot = await getActiveReportSnapshot(storage, lifecycle);

      expect(snapshot.report.status).toBe('active');
      expect(snapshot.pending_totals).toEqual({ post_published: 2, user_registered: 1 });
      expect(snapshot.pending_events).toBe(3);
    });
  });

  describe('acknowledgeDelivery', () => {
    it('marks a frozen report as emailed', async () => {
      const id = await freezeWith(['post_published']);

      expect(await acknowledgeDelivery(storage, id)).toBe(true);
      expect((await storage.reports.findById(id))?.emailed).toBe(true);
    });

    it('refuses the active report and unknown ids', async () => {
      const active = await lifecycle.getOrCreateActiveReport();

      expect(await acknowledgeDelivery(storage, active.id)).toBe(false);
      expect(await acknowledgeDelivery(storage, 999)).toBe(false);
    });
  });
});

describe('event queries', () => {
  let storage: InMemoryReportingStorage;

  beforeEach(async () => {
    storage = new InMemoryReportingStorage();
    for (let i = 1; i <= 8; i++) {
      await storage.events.append({ event_type: `t${i}`, event_timestamp: new Date(Date.UTC(2026, 2, i)) });
    }
  });

  it('defaults to 50 unassigned events from offset 0', async () => {
    const result = await listEvents(storage.events, {});

    expect(result.pagination).toEqual({ limit: 50, offset: 0, count: 8 });
    expect(result.data[0]?.event_type).toBe('t8');
  });

  it('clamps limit to [1, 500]', async () => {
    expect((await listEvents(storage.events, { limit: 0 })).pagination.limit).toBe(1);
    expect((await listEvents(storage.events, { limit: 501 })).pagination.limit).toBe(500);
  });

  it('returns the newest five recent events by default, at most fifty', async () => {
    expect((await listRecentEvents(storage.events)).map((event) => event.event_type))
      .toEqual(['t8', 't7', 't6', 't5', 't4']);
    expect(await listRecentEvents(storage.events, 100)).toHaveLength(8);
  });
});
