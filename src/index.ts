import Fastify from 'fastify';
import type { ReportingStorage } from './domain/index.js';
import { ReportLifecycle } from './application/index.js';
import type { ReportFrozenListener } from './application/index.js';
import {
  redisPlugin,
  dbPlugin,
  createDrizzleStorage,
  RedisRecentEventsCache,
  createReportFrozenPublisher,
  InMemoryReportingStorage,
  loadAppConfig,
  loadEventLabels,
  createAnthropicNarrative,
} from './infrastructure/index.js';
import { registerApi } from './interfaces/http/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Configuration
 * 2) Infrastructure plugins (Postgres driver only)
 * 3) Lifecycle engine + HTTP routes
 * 4) Ensure an active report exists
 * 5) listen()
 */
async function main(): Promise<void> {
  const config = loadAppConfig();

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  let storage: ReportingStorage;
  let onFrozen: ReportFrozenListener | null = null;

  if (config.storageDriver === 'postgres') {
    await fastify.register(redisPlugin, { url: config.redisUrl });
    await fastify.register(dbPlugin, { databaseUrl: config.databaseUrl });

    storage = createDrizzleStorage(fastify.db, new RedisRecentEventsCache(fastify.redis, fastify.log));
    onFrozen = createReportFrozenPublisher(fastify.redis, fastify.log);
  } else {
    fastify.log.warn('STORAGE_DRIVER=memory: data lives only as long as this process');
    storage = new InMemoryReportingStorage();
  }

  const lifecycle = new ReportLifecycle({
    storage,
    labels: loadEventLabels(fastify.log, config.eventLabelsPath),
    narrative: createAnthropicNarrative({
      apiKey: config.narrative.apiKey,
      model: config.narrative.model,
      timeoutMs: config.narrative.timeoutMs,
      maxRetries: config.narrative.maxRetries,
      log: fastify.log,
    }),
    log: fastify.log,
    onFrozen,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await registerApi(fastify, { storage, lifecycle });

  const active = await lifecycle.getOrCreateActiveReport();
  fastify.log.info({ report_id: active.id, period_start: active.period_start.toISOString() }, 'Active report ready');

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
