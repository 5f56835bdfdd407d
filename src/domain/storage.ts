import type { ActivityEvent, EventTotals, NewActivityEvent } from './event.js';
import type { Report, ReportSummary } from './report.js';

export interface PaginationParams {
  limit: number;
  offset: number;
}

/**
 * Append-only log of activity events.
 *
 * `claimForPeriod` is the only write that touches existing rows, and it only
 * ever fills a null `report_id`.
 */
export interface EventStore {
  /** Inserts an unassigned event and returns its id. */
  append(event: NewActivityEvent): Promise<number>;

  /**
   * Sets `report_id` on every unassigned event with
   * `periodStart <= event_timestamp <= periodEnd`. Returns the rows affected.
   */
  claimForPeriod(reportId: number, periodStart: Date, periodEnd: Date): Promise<number>;

  /** Events of a report (`null` = unassigned), newest first. Unbounded without `page`. */
  listByReport(reportId: number | null, page?: PaginationParams): Promise<ActivityEvent[]>;

  /** Newest unassigned events. May be served from a read-through cache. */
  listRecent(limit: number): Promise<ActivityEvent[]>;

  countByType(reportId: number | null): Promise<EventTotals>;

  /** Newest event of `eventType` for `objectId`, assigned or not. */
  lastEventFor(eventType: string, objectId: string): Promise<ActivityEvent | null>;

  /** Retention: removes events with `event_timestamp < cutoff`. */
  deleteOlderThan(cutoff: Date): Promise<number>;
}

export interface FreezeCompletion {
  frozen_at: Date;
  event_count: number;
  summary_data: ReportSummary;
}

export interface OpenedReport {
  id: number;
  /** `false` when another report was already active; `id` is that report. */
  created: boolean;
}

export interface ReportStore {
  /**
   * Inserts an `active` report with empty counters unless one is already
   * active. The check and the insert are one atomic step.
   */
  createIfNoneActive(input: { period_start: Date }): Promise<OpenedReport>;

  findActive(): Promise<Report | null>;

  /**
   * Sets `period_end` only if the report is still active and unsealed.
   * `false` means another freeze already claimed it.
   */
  beginFreeze(reportId: number, periodEnd: Date): Promise<boolean>;

  /** Seals the report: `status = frozen` plus the freeze results, in one write. */
  completeFreeze(reportId: number, completion: FreezeCompletion): Promise<boolean>;

  findById(reportId: number): Promise<Report | null>;

  findLastFrozen(): Promise<Report | null>;

  /** Frozen reports, newest first. */
  listFrozen(page: PaginationParams): Promise<Report[]>;

  /** Delivery acknowledgement. Never called by the lifecycle engine. */
  markEmailed(reportId: number): Promise<boolean>;
}

/**
 * Both stores plus a unit-of-work boundary.
 *
 * Writes made through the storage handed to `work` are rolled back if `work`
 * throws.
 */
export interface ReportingStorage {
  readonly events: EventStore;
  readonly reports: ReportStore;
  transaction<T>(work: (tx: ReportingStorage) => Promise<T>): Promise<T>;
  /** Cheap round-trip used by health checks. */
  ping(): Promise<void>;
}
