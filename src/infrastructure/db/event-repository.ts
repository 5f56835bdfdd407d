import { and, count, desc, eq, gte, isNull, lt, lte, type SQL } from 'drizzle-orm';
import type {
  ActivityEvent,
  EventStore,
  EventTotals,
  NewActivityEvent,
  PaginationParams,
} from '../../domain/index.js';
import { PersistenceError, guardPersistence } from '../../domain/index.js';
import type { RecentEventsCache } from '../redis/recent-events-cache.js';
import type { DbExecutor } from './client.js';
import { activityEvents } from './schema.js';

function reportFilter(reportId: number | null): SQL {
  return reportId === null ? isNull(activityEvents.report_id) : eq(activityEvents.report_id, reportId);
}

/**
 * Postgres-backed event log.
 *
 * Every method converts driver failures into PersistenceError. Writes
 * invalidate the recent-events cache after the statement succeeds; stores
 * bound to a transaction get no cache and `createDrizzleStorage` invalidates
 * once the transaction commits.
 */
export class DrizzleEventStore implements EventStore {
  private readonly db: DbExecutor;
  private readonly cache: RecentEventsCache | null;

  constructor(db: DbExecutor, cache: RecentEventsCache | null = null) {
    this.db = db;
    this.cache = cache;
  }

  async append(event: NewActivityEvent): Promise<number> {
    const [row] = await guardPersistence('append_event', async () =>
      this.db
        .insert(activityEvents)
        .values({
          event_type: event.event_type,
          event_subtype: event.event_subtype ?? null,
          object_id: event.object_id ?? null,
          user_id: event.user_id ?? null,
          event_data: event.event_data ?? {},
          event_timestamp: event.event_timestamp ?? new Date(),
          source_plugin: event.source_plugin ?? 'core',
        })
        .returning({ id: activityEvents.id }),
    );

    if (row === undefined) {
      throw new PersistenceError('append_event', null, 'Insert into activity_events returned no id');
    }

    await this.cache?.invalidate();
    return row.id;
  }

  /**
   * UPDATE … SET report_id WHERE report_id IS NULL AND timestamp in range.
   * Rows already owned by any report never match, so repeating the claim
   * affects zero rows.
   */
  async claimForPeriod(reportId: number, periodStart: Date, periodEnd: Date): Promise<number> {
    const rows = await guardPersistence('claim_events', async () =>
      this.db
        .update(activityEvents)
        .set({ report_id: reportId })
        .where(and(
          isNull(activityEvents.report_id),
          gte(activityEvents.event_timestamp, periodStart),
          lte(activityEvents.event_timestamp, periodEnd),
        ))
        .returning({ id: activityEvents.id }),
    );

    await this.cache?.invalidate();
    return rows.length;
  }

  async listByReport(reportId: number | null, page?: PaginationParams): Promise<ActivityEvent[]> {
    return guardPersistence('list_events', async () => {
      const query = this.db
        .select()
        .from(activityEvents)
        .where(reportFilter(reportId))
        .orderBy(desc(activityEvents.event_timestamp), desc(activityEvents.id));

      if (page === undefined) return query;
      return query.limit(page.limit).offset(page.offset);
    });
  }

  async listRecent(limit: number): Promise<ActivityEvent[]> {
    const cached = await this.cache?.get(limit);
    if (cached !== undefined && cached !== null) return cached;

    const rows = await this.listByReport(null, { limit, offset: 0 });
    await this.cache?.set(limit, rows);
    return rows;
  }

  async countByType(reportId: number | null): Promise<EventTotals> {
    const rows = await guardPersistence('count_events', async () =>
      this.db
        .select({ event_type: activityEvents.event_type, count: count() })
        .from(activityEvents)
        .where(reportFilter(reportId))
        .groupBy(activityEvents.event_type),
    );

    return Object.fromEntries(rows.map((row) => [row.event_type, Number(row.count)]));
  }

  async lastEventFor(eventType: string, objectId: string): Promise<ActivityEvent | null> {
    const rows = await guardPersistence('last_event', async () =>
      this.db
        .select()
        .from(activityEvents)
        .where(and(eq(activityEvents.event_type, eventType), eq(activityEvents.object_id, objectId)))
        .orderBy(desc(activityEvents.event_timestamp), desc(activityEvents.id))
        .limit(1),
    );

    return rows[0] ?? null;
  }

  async deleteOlderThan(cutoff: Date): Promise<number> {
    const rows = await guardPersistence('delete_events', async () =>
      this.db
        .delete(activityEvents)
        .where(lt(activityEvents.event_timestamp, cutoff))
        .returning({ id: activityEvents.id }),
    );

    if (rows.length > 0) await this.cache?.invalidate();
    return rows.length;
  }
}
