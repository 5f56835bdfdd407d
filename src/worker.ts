import { Redis } from 'ioredis';
import pino from 'pino';
import type { ReportingStorage } from './domain/index.js';
import { ReportLifecycle, purgeExpiredEvents } from './application/index.js';
import type { ReportFrozenListener } from './application/index.js';
import {
  createDbClient,
  ensureSchema,
  createDrizzleStorage,
  RedisRecentEventsCache,
  createReportFrozenPublisher,
  InMemoryReportingStorage,
  loadAppConfig,
  loadEventLabels,
  createAnthropicNarrative,
  nextWeeklyRun,
  nextDailyRun,
  runJobLoop,
} from './infrastructure/index.js';

/**
 * Standalone scheduler process.
 *
 * - Weekly: freeze the active report and open the next one.
 * - Daily 03:00 UTC: delete events past the retention window.
 *
 * Runs independently of the HTTP server; run exactly one instance so
 * scheduled freezes do not race each other.
 */
const config = loadAppConfig();
const log = pino({ level: config.logLevel });

const RETENTION_SCHEDULE = { hour: 3, minute: 0 };

// Abort controller for graceful shutdown
const ac = new AbortController();
const cleanups: Array<() => Promise<unknown>> = [];

async function openStorage(): Promise<{ storage: ReportingStorage; onFrozen: ReportFrozenListener | null }> {
  if (config.storageDriver === 'memory') {
    log.warn('STORAGE_DRIVER=memory: the worker sees only its own in-process data');
    return { storage: new InMemoryReportingStorage(), onFrozen: null };
  }

  const redis = new Redis(config.redisUrl, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: true,
  });
  await redis.connect();
  cleanups.push(() => redis.quit());
  log.info('Redis connected');

  const { sql, db } = createDbClient(config.databaseUrl);
  cleanups.push(() => sql.end());
  await ensureSchema(sql);
  log.info('Database ready (activity_events + reports tables)');

  return {
    storage: createDrizzleStorage(db, new RedisRecentEventsCache(redis, log)),
    onFrozen: createReportFrozenPublisher(redis, log),
  };
}

async function main(): Promise<void> {
  const { storage, onFrozen } = await openStorage();

  const lifecycle = new ReportLifecycle({
    storage,
    labels: loadEventLabels(log, config.eventLabelsPath),
    narrative: createAnthropicNarrative({
      apiKey: config.narrative.apiKey,
      model: config.narrative.model,
      timeoutMs: config.narrative.timeoutMs,
      maxRetries: config.narrative.maxRetries,
      log,
    }),
    log,
    onFrozen,
  });

  const active = await lifecycle.getOrCreateActiveReport();
  log.info({ report_id: active.id }, 'Active report ready');

  await Promise.all([
    runJobLoop(
      {
        name: 'weekly-freeze',
        next: (from) => nextWeeklyRun(from, config.freezeSchedule),
        run: async () => {
          await lifecycle.freezeCurrentReport();
        },
      },
      { log, signal: ac.signal },
    ),
    runJobLoop(
      {
        name: 'retention-cleanup',
        next: (from) => nextDailyRun(from, RETENTION_SCHEDULE),
        run: async () => {
          await purgeExpiredEvents(storage.events, log, config.retentionDays);
        },
      },
      { log, signal: ac.signal },
    ),
  ]);
}

async function closeConnections(): Promise<void> {
  for (const cleanup of cleanups.reverse()) {
    try {
      await cleanup();
    } catch (err: unknown) {
      log.warn({ err }, 'Error while closing connection');
    }
  }
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main()
  .then(closeConnections)
  .catch(async (err: unknown) => {
    log.fatal({ err }, 'Worker crashed');
    await closeConnections();
    process.exit(1);
  });
