export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { RedisRecentEventsCache } from './recent-events-cache.js';
export type { RecentEventsCache } from './recent-events-cache.js';
export {
  publishReportFrozen,
  createReportFrozenPublisher,
  REPORT_FROZEN_CHANNEL,
} from './report-notifier.js';
