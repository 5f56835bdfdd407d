import {
  pgTable,
  bigserial,
  bigint,
  varchar,
  timestamp,
  jsonb,
  integer,
  boolean,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { EventData } from '../../domain/index.js';

/**
 * Drizzle schema for the `activity_events` table.
 *
 * `report_id` stays NULL until a freeze claims the event; after that it is
 * never rewritten. No FK to `reports`; retention may prune events of old
 * reports independently.
 */
export const activityEvents = pgTable('activity_events', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  event_type: varchar('event_type', { length: 50 }).notNull(),
  event_subtype: varchar('event_subtype', { length: 50 }),
  object_id: varchar('object_id', { length: 64 }),
  user_id: varchar('user_id', { length: 64 }),
  event_data: jsonb('event_data').$type<EventData>().notNull().default({}),
  event_timestamp: timestamp('event_timestamp', { withTimezone: true }).notNull().defaultNow(),
  report_id: bigint('report_id', { mode: 'number' }),
  source_plugin: varchar('source_plugin', { length: 100 }).notNull().default('core'),
}, (table) => [
  index('idx_activity_events_event_type').on(table.event_type),
  index('idx_activity_events_report_id').on(table.report_id),
  index('idx_activity_events_timestamp').on(table.event_timestamp),
  index('idx_activity_events_object').on(table.event_type, table.object_id),
]);

/**
 * Drizzle schema for the `reports` table.
 *
 * At most one row is `active`: creation is serialized by an advisory lock
 * in the report store and backed by a partial unique index.
 */
export const reports = pgTable('reports', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  status: varchar('status', { length: 20 }).notNull().default('active'),
  period_start: timestamp('period_start', { withTimezone: true }).notNull(),
  period_end: timestamp('period_end', { withTimezone: true }),
  frozen_at: timestamp('frozen_at', { withTimezone: true }),
  event_count: integer('event_count').notNull().default(0),
  summary_data: jsonb('summary_data'),
  emailed: boolean('emailed').notNull().default(false),
  emailed_at: timestamp('emailed_at', { withTimezone: true }),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_reports_status').on(table.status),
  uniqueIndex('uq_reports_single_active').on(table.status).where(sql`status = 'active'`),
  index('idx_reports_frozen_at').on(table.frozen_at),
]);

export type ActivityEventRow = typeof activityEvents.$inferSelect;
export type ReportRow = typeof reports.$inferSelect;
