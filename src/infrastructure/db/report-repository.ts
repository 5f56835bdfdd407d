import { and, desc, eq, isNull, sql } from 'drizzle-orm';
import type {
  FreezeCompletion,
  OpenedReport,
  PaginationParams,
  Report,
  ReportStatus,
  ReportStore,
} from '../../domain/index.js';
import { PersistenceError, guardPersistence } from '../../domain/index.js';
import { parseReportSummary } from '../../application/summary-schema.js';
import type { DbExecutor } from './client.js';
import { LOCK_NOT_AVAILABLE, UNIQUE_VIOLATION, pgErrorCode } from './pg-errors.js';
import { reports, type ReportRow } from './schema.js';

/** Serializes active-report creation across processes. */
const ACTIVE_REPORT_LOCK = sql`select pg_advisory_xact_lock(hashtext('activity_rollup.active_report'))`;

function toStatus(value: string): ReportStatus {
  if (value === 'active' || value === 'frozen') return value;
  throw new Error(`Unknown report status "${value}"`);
}

function toReport(row: ReportRow): Report {
  return {
    id: row.id,
    status: toStatus(row.status),
    period_start: row.period_start,
    period_end: row.period_end,
    frozen_at: row.frozen_at,
    event_count: row.event_count,
    summary_data: parseReportSummary(row.summary_data),
    emailed: row.emailed,
    emailed_at: row.emailed_at,
    created_at: row.created_at,
  };
}

/**
 * Postgres-backed report store.
 *
 * `beginFreeze` and `completeFreeze` are conditional updates guarded by
 * `status = 'active'`. `beginFreeze` locks the row with NOWAIT, so a second
 * freeze reports `false` at once instead of queueing behind the first.
 */
export class DrizzleReportStore implements ReportStore {
  private readonly db: DbExecutor;

  constructor(db: DbExecutor) {
    this.db = db;
  }

  async createIfNoneActive(input: { period_start: Date }): Promise<OpenedReport> {
    try {
      return await guardPersistence('create_report', async () =>
        this.db.transaction(async (tx) => {
          await tx.execute(ACTIVE_REPORT_LOCK);

          const [active] = await tx
            .select({ id: reports.id })
            .from(reports)
            .where(eq(reports.status, 'active'))
            .orderBy(desc(reports.created_at), desc(reports.id))
            .limit(1);
          if (active !== undefined) return { id: active.id, created: false };

          const [row] = await tx
            .insert(reports)
            .values({ status: 'active', period_start: input.period_start })
            .returning({ id: reports.id });
          if (row === undefined) {
            throw new PersistenceError('create_report', null, 'Insert into reports returned no id');
          }
          return { id: row.id, created: true };
        }),
      );
    } catch (err: unknown) {
      if (pgErrorCode(err) !== UNIQUE_VIOLATION) throw err;
      const active = await this.findActive();
      if (active === null) throw err;
      return { id: active.id, created: false };
    }
  }

  async findActive(): Promise<Report | null> {
    return guardPersistence('find_active_report', async () => {
      const [row] = await this.db
        .select()
        .from(reports)
        .where(eq(reports.status, 'active'))
        .orderBy(desc(reports.created_at), desc(reports.id))
        .limit(1);

      return row === undefined ? null : toReport(row);
    });
  }

  async beginFreeze(reportId: number, periodEnd: Date): Promise<boolean> {
    return guardPersistence('begin_freeze', async () => {
      const unsealed = and(eq(reports.id, reportId), eq(reports.status, 'active'), isNull(reports.period_end));

      try {
        const [locked] = await this.db
          .select({ id: reports.id })
          .from(reports)
          .where(unsealed)
          .for('update', { noWait: true });
        if (locked === undefined) return false;
      } catch (err: unknown) {
        if (pgErrorCode(err) === LOCK_NOT_AVAILABLE) return false;
        throw err;
      }

      const rows = await this.db
        .update(reports)
        .set({ period_end: periodEnd })
        .where(unsealed)
        .returning({ id: reports.id });
      return rows.length > 0;
    });
  }

  async completeFreeze(reportId: number, completion: FreezeCompletion): Promise<boolean> {
    const rows = await guardPersistence('complete_freeze', async () =>
      this.db
        .update(reports)
        .set({
          status: 'frozen',
          frozen_at: completion.frozen_at,
          event_count: completion.event_count,
          summary_data: completion.summary_data,
        })
        .where(and(eq(reports.id, reportId), eq(reports.status, 'active')))
        .returning({ id: reports.id }),
    );

    return rows.length > 0;
  }

  async findById(reportId: number): Promise<Report | null> {
    return guardPersistence('find_report', async () => {
      const [row] = await this.db.select().from(reports).where(eq(reports.id, reportId)).limit(1);
      return row === undefined ? null : toReport(row);
    });
  }

  async findLastFrozen(): Promise<Report | null> {
    const [latest] = await this.listFrozen({ limit: 1, offset: 0 });
    return latest ?? null;
  }

  async listFrozen(page: PaginationParams): Promise<Report[]> {
    return guardPersistence('list_frozen_reports', async () => {
      const rows = await this.db
        .select()
        .from(reports)
        .where(eq(reports.status, 'frozen'))
        .orderBy(desc(reports.frozen_at), desc(reports.id))
        .limit(page.limit)
        .offset(page.offset);

      // Stored summaries that fail validation surface as PersistenceError.
      return rows.map(toReport);
    });
  }

  async markEmailed(reportId: number): Promise<boolean> {
    const rows = await guardPersistence('mark_emailed', async () =>
      this.db
        .update(reports)
        .set({ emailed: true, emailed_at: new Date() })
        .where(eq(reports.id, reportId))
        .returning({ id: reports.id }),
    );

    return rows.length > 0;
  }
}
