export { activityEvents, reports } from './schema.js';
export type { ActivityEventRow, ReportRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbConnection, DbExecutor } from './client.js';
export { ensureSchema } from './migrate.js';
export { DrizzleEventStore } from './event-repository.js';
export { DrizzleReportStore } from './report-repository.js';
export { createDrizzleStorage } from './storage.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
