import type { BaseLogger } from 'pino';
import type { Report, ReportingStorage } from '../domain/index.js';
import {
  AlreadyFrozenError,
  InvariantViolationError,
  NoActiveReportError,
  PersistenceError,
  RolloverFailedError,
  isReportLifecycleError,
} from '../domain/index.js';
import type { EventLabelTable } from './event-labels.js';
import type { NarrativeOverlay } from './aggregator.js';
import { summarize } from './aggregator.js';

/** Published after a freeze commits and the next report is open. */
export interface ReportFrozenNotice {
  readonly report_id: number;
  readonly active_report_id: number;
  readonly event_count: number;
  readonly frozen_at: string; // ISO-8601
}

export type ReportFrozenListener = (notice: ReportFrozenNotice) => Promise<void>;

export interface ReportLifecycleDeps {
  storage: ReportingStorage;
  labels: EventLabelTable;
  narrative: NarrativeOverlay | null;
  log: BaseLogger;
  /** Best-effort; failures are logged and never fail the freeze. */
  onFrozen?: ReportFrozenListener | null;
  /** Clock, injectable for tests. */
  now?: () => Date;
}

interface SealedReport {
  report_id: number;
  event_count: number;
  frozen_at: Date;
}

/**
 * Report lifecycle engine: `(none) → active → frozen`.
 *
 * Holds no state between calls. "The active report" is re-read from storage
 * on every invocation, and the conditional writes in the store are what keep
 * two freezes from sealing the same report.
 */
export class ReportLifecycle {
  private readonly storage: ReportingStorage;
  private readonly labels: EventLabelTable;
  private readonly narrative: NarrativeOverlay | null;
  private readonly log: BaseLogger;
  private readonly onFrozen: ReportFrozenListener | null;
  private readonly nowFn: () => Date;

  constructor(deps: ReportLifecycleDeps) {
    this.storage = deps.storage;
    this.labels = deps.labels;
    this.narrative = deps.narrative;
    this.log = deps.log;
    this.onFrozen = deps.onFrozen ?? null;
    this.nowFn = deps.now ?? (() => new Date());
  }

  /**
   * Opens a new active report starting now.
   *
   * Throws InvariantViolationError when one is already active.
   */
  async createNewActiveReport(): Promise<number> {
    const opened = await this.storage.reports.createIfNoneActive({ period_start: this.nowFn() });
    if (!opened.created) {
      throw new InvariantViolationError(opened.id);
    }

    this.log.info({ report_id: opened.id }, 'Active report opened');
    return opened.id;
  }

  /** Returns the active report, opening one if none exists. */
  async getOrCreateActiveReport(): Promise<Report> {
    const active = await this.storage.reports.findActive();
    if (active !== null) return active;

    this.log.warn('No active report found, opening a new one');
    const reportId = await this.ensureActiveReport();
    const report = await this.storage.reports.findById(reportId);
    if (report === null) {
      throw new PersistenceError('find_report', null, `Report ${reportId} vanished after creation`);
    }
    return report;
  }

  /**
   * Freezes the active report and opens the next one.
   *
   * 1. Read the active report (NoActiveReport → self-heal, then fail).
   * 2. Stamp `period_end` with a conditional write (AlreadyFrozen if lost).
   * 3. Claim unassigned events in `[period_start, period_end]`.
   * 4. Read the previous frozen report's totals as the trend baseline.
   * 5. Aggregate.
   * 6. Seal the report in one write.
   * 7. Open the next active report.
   *
   * Steps 1–6 run in one transaction: on failure nothing is committed and the
   * report stays active with `period_end` unset.
   */
  async freezeCurrentReport(): Promise<number> {
    let sealed: SealedReport;
    try {
      sealed = await this.runInTransaction('freeze_report', (tx) => this.sealActiveReport(tx));
    } catch (err: unknown) {
      if (err instanceof NoActiveReportError) {
        await this.healAfterMissingReport();
      }
      throw err;
    }

    this.log.info(
      { report_id: sealed.report_id, event_count: sealed.event_count },
      'Report frozen',
    );

    let activeReportId: number;
    try {
      activeReportId = await this.ensureActiveReport();
    } catch (err: unknown) {
      this.log.error(
        { err, report_id: sealed.report_id },
        'Report frozen but the next active report could not be opened',
      );
      throw new RolloverFailedError(sealed.report_id, err);
    }

    await this.notifyFrozen({
      report_id: sealed.report_id,
      active_report_id: activeReportId,
      event_count: sealed.event_count,
      frozen_at: sealed.frozen_at.toISOString(),
    });

    return sealed.report_id;
  }

  private async sealActiveReport(tx: ReportingStorage): Promise<SealedReport> {
    const active = await tx.reports.findActive();
    if (active === null) {
      throw new NoActiveReportError();
    }
    if (active.period_end !== null) {
      throw new AlreadyFrozenError(active.id);
    }

    const periodEnd = this.nowFn();
    const claimedSeal = await tx.reports.beginFreeze(active.id, periodEnd);
    if (!claimedSeal) {
      throw new AlreadyFrozenError(active.id);
    }

    const claimed = await tx.events.claimForPeriod(active.id, active.period_start, periodEnd);

    // Re-read everything owned by the report: a retried freeze re-includes
    // events this report claimed before, without claiming them twice.
    const events = await tx.events.listByReport(active.id);

    const previous = await tx.reports.findLastFrozen();
    const baseline = previous?.summary_data?.totals ?? {};

    const summary = await summarize(events, baseline, {
      labels: this.labels,
      narrative: this.narrative,
      log: this.log,
    });

    const frozenAt = this.nowFn();
    const completed = await tx.reports.completeFreeze(active.id, {
      frozen_at: frozenAt,
      event_count: events.length,
      summary_data: summary,
    });
    if (!completed) {
      throw new AlreadyFrozenError(active.id);
    }

    this.log.debug(
      { report_id: active.id, claimed, event_count: events.length, baseline_report_id: previous?.id ?? null },
      'Report sealed',
    );

    return { report_id: active.id, event_count: events.length, frozen_at: frozenAt };
  }

  /**
   * Opens an active report unless one already exists.
   * Losing the race to another opener is success: the invariant holds.
   */
  private async ensureActiveReport(): Promise<number> {
    try {
      return await this.createNewActiveReport();
    } catch (err: unknown) {
      if (err instanceof InvariantViolationError) {
        return err.active_report_id;
      }
      throw err;
    }
  }

  private async healAfterMissingReport(): Promise<void> {
    try {
      const reportId = await this.ensureActiveReport();
      this.log.warn({ report_id: reportId }, 'Freeze found no active report; opened a new one');
    } catch (err: unknown) {
      this.log.error({ err }, 'Failed to open an active report after a missing-report freeze');
    }
  }

  private async notifyFrozen(notice: ReportFrozenNotice): Promise<void> {
    if (this.onFrozen === null) return;
    try {
      await this.onFrozen(notice);
    } catch (err: unknown) {
      this.log.warn({ err, report_id: notice.report_id }, 'Report frozen listener failed');
    }
  }

  private async runInTransaction<T>(
    operation: string,
    work: (tx: ReportingStorage) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.storage.transaction(work);
    } catch (err: unknown) {
      if (isReportLifecycleError(err)) throw err;
      throw new PersistenceError(operation, err);
    }
  }
}
