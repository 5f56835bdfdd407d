import type { ActivityEvent, EventStore, EventTotals } from '../domain/index.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

const DEFAULT_RECENT_LIMIT = 5;
const MAX_RECENT_LIMIT = 50;

export interface ListEventsParams {
  /** Omitted or `null` = unassigned events. */
  report_id?: number | null;
  limit?: number;
  offset?: number;
}

/**
 * Use case: list a report's events (or the unassigned ones), newest first.
 * Clamps limit to [1, 500], defaults to 50.
 */
export async function listEvents(events: EventStore, params: ListEventsParams) {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const data = await events.listByReport(params.report_id ?? null, { limit, offset });

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}

/**
 * Use case: newest unassigned events for dashboards.
 * Clamps limit to [1, 50], defaults to 5.
 */
export async function listRecentEvents(events: EventStore, limit?: number): Promise<ActivityEvent[]> {
  const clamped = Math.min(Math.max(limit ?? DEFAULT_RECENT_LIMIT, 1), MAX_RECENT_LIMIT);
  return events.listRecent(clamped);
}

/** Use case: counts by event type for a report (`null` = unassigned). */
export async function countEvents(events: EventStore, reportId: number | null): Promise<EventTotals> {
  return events.countByType(reportId);
}

/**
 * Use case: newest event for an object, used by producers for throttling.
 * Returns null if none.
 */
export async function getLastEvent(
  events: EventStore,
  eventType: string,
  objectId: string,
): Promise<ActivityEvent | null> {
  return events.lastEventFor(eventType, objectId);
}
