import type { DbConnection } from './client.js';

const STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS activity_events (
    id               BIGSERIAL    PRIMARY KEY,
    event_type       VARCHAR(50)  NOT NULL,
    event_subtype    VARCHAR(50),
    object_id        VARCHAR(64),
    user_id          VARCHAR(64),
    event_data       JSONB        NOT NULL DEFAULT '{}',
    event_timestamp  TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
    report_id        BIGINT,
    source_plugin    VARCHAR(100) NOT NULL DEFAULT 'core'
  )`,
  `CREATE TABLE IF NOT EXISTS reports (
    id            BIGSERIAL   PRIMARY KEY,
    status        VARCHAR(20) NOT NULL DEFAULT 'active',
    period_start  TIMESTAMPTZ NOT NULL,
    period_end    TIMESTAMPTZ,
    frozen_at     TIMESTAMPTZ,
    event_count   INTEGER     NOT NULL DEFAULT 0,
    summary_data  JSONB,
    emailed       BOOLEAN     NOT NULL DEFAULT false,
    emailed_at    TIMESTAMPTZ,
    created_at    TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  'CREATE INDEX IF NOT EXISTS idx_activity_events_event_type ON activity_events (event_type)',
  'CREATE INDEX IF NOT EXISTS idx_activity_events_report_id ON activity_events (report_id)',
  'CREATE INDEX IF NOT EXISTS idx_activity_events_timestamp ON activity_events (event_timestamp)',
  'CREATE INDEX IF NOT EXISTS idx_activity_events_object ON activity_events (event_type, object_id)',
  'CREATE INDEX IF NOT EXISTS idx_reports_status ON reports (status)',
  'CREATE INDEX IF NOT EXISTS idx_reports_frozen_at ON reports (frozen_at)',
  "CREATE UNIQUE INDEX IF NOT EXISTS uq_reports_single_active ON reports (status) WHERE status = 'active'",
];

/**
 * Ensures tables exist (lightweight migration via raw SQL).
 *
 * drizzle-kit owns real migrations; this guarantees a fresh database works
 * on first run.
 */
export async function ensureSchema(sql: DbConnection): Promise<void> {
  for (const statement of STATEMENTS) {
    await sql.unsafe(statement);
  }
}
