import type { ActivityEvent, Report, ReportingStorage } from '../domain/index.js';
import type { ReportLifecycle } from './report-lifecycle.js';

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

const DEFAULT_EVENT_LIMIT = 100;
const MAX_EVENT_LIMIT = 500;

export interface ListReportsParams {
  limit?: number;
  offset?: number;
}

/**
 * Use case: list frozen reports, newest first.
 * Clamps limit to [1, 100], defaults to 20.
 */
export async function listFrozenReports(storage: ReportingStorage, params: ListReportsParams) {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const data = await storage.reports.listFrozen({ limit, offset });

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}

/** Use case: fetch a single report. Returns null if not found. */
export async function getReport(storage: ReportingStorage, reportId: number): Promise<Report | null> {
  return storage.reports.findById(reportId);
}

/**
 * Use case: events of one report, newest first.
 * Returns null when the report does not exist.
 */
export async function getReportEvents(
  storage: ReportingStorage,
  reportId: number,
  limit?: number,
): Promise<ActivityEvent[] | null> {
  const report = await storage.reports.findById(reportId);
  if (report === null) return null;

  const clamped = Math.min(Math.max(limit ?? DEFAULT_EVENT_LIMIT, 1), MAX_EVENT_LIMIT);
  return storage.events.listByReport(reportId, { limit: clamped, offset: 0 });
}

export interface ActiveReportSnapshot {
  report: Report;
  /** Unassigned events collected so far, by type. */
  pending_totals: Record<string, number>;
  pending_events: number;
}

/**
 * Use case: the open report with live counts of what it will claim.
 *
 * Opens a report when none is active, so readers self-heal a failed
 * rollover.
 */
export async function getActiveReportSnapshot(
  storage: ReportingStorage,
  lifecycle: ReportLifecycle,
): Promise<ActiveReportSnapshot> {
  const report = await lifecycle.getOrCreateActiveReport();
  const pending_totals = await storage.events.countByType(null);
  const pending_events = Object.values(pending_totals).reduce((sum, n) => sum + n, 0);

  return { report, pending_totals, pending_events };
}

/**
 * Use case: the delivery collaborator reports a frozen report as sent.
 * Returns false when the report does not exist or is still active.
 */
export async function acknowledgeDelivery(storage: ReportingStorage, reportId: number): Promise<boolean> {
  const report = await storage.reports.findById(reportId);
  if (report === null || report.status !== 'frozen') return false;
  return storage.reports.markEmailed(reportId);
}
