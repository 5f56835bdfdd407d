import { sql } from 'drizzle-orm';
import type { ReportingStorage } from '../../domain/index.js';
import { guardPersistence } from '../../domain/index.js';
import type { RecentEventsCache } from '../redis/recent-events-cache.js';
import type { DbExecutor } from './client.js';
import { DrizzleEventStore } from './event-repository.js';
import { DrizzleReportStore } from './report-repository.js';

/**
 * Wires both Drizzle stores to one executor.
 *
 * Inside `transaction` the stores are rebuilt on the transaction handle, so
 * every write made through `tx` commits or rolls back together. They carry
 * no cache: the recent-events cache is cleared after the commit, never while
 * uncommitted rows could be read back into it.
 */
export function createDrizzleStorage(
  db: DbExecutor,
  cache: RecentEventsCache | null = null,
): ReportingStorage {
  return {
    events: new DrizzleEventStore(db, cache),
    reports: new DrizzleReportStore(db),
    transaction: async (work) => {
      const result = await db.transaction(async (tx) => work(createDrizzleStorage(tx, null)));
      await cache?.invalidate();
      return result;
    },
    ping: async () => {
      await guardPersistence('ping', async () => db.execute(sql`select 1`));
    },
  };
}
