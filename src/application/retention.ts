import type { BaseLogger } from 'pino';
import type { EventStore } from '../domain/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_RETENTION_DAYS = 365;

/**
 * Use case: delete events older than the retention window.
 *
 * Frozen reports keep their `summary_data`, so pruning old events never
 * changes what a report says.
 */
export async function purgeExpiredEvents(
  events: EventStore,
  log: BaseLogger,
  retentionDays: number = DEFAULT_RETENTION_DAYS,
  now: Date = new Date(),
): Promise<number> {
  const cutoff = new Date(now.getTime() - retentionDays * DAY_MS);
  const deleted = await events.deleteOlderThan(cutoff);

  if (deleted > 0) {
    log.info({ deleted, cutoff: cutoff.toISOString() }, 'Expired events purged');
  } else {
    log.debug({ cutoff: cutoff.toISOString() }, 'No expired events to purge');
  }

  return deleted;
}
