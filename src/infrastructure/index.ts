export {
  redisPlugin,
  RedisRecentEventsCache,
  publishReportFrozen,
  createReportFrozenPublisher,
  REPORT_FROZEN_CHANNEL,
} from './redis/index.js';
export type { RedisPluginOptions, RecentEventsCache } from './redis/index.js';
export {
  createDbClient,
  createDrizzleStorage,
  ensureSchema,
  dbPlugin,
  activityEvents,
  reports,
} from './db/index.js';
export type { Database, DbConnection, DbExecutor } from './db/index.js';
export { InMemoryReportingStorage } from './memory/index.js';
export { loadAppConfig, loadEventLabels, ConfigError } from './config/index.js';
export type { AppConfig, StorageDriver, WeeklySchedule } from './config/index.js';
export { createAnthropicNarrative } from './ai/anthropic-narrative.js';
export { nextWeeklyRun, nextDailyRun, runJobLoop } from './scheduler/index.js';
