/**
 * Error taxonomy for the report lifecycle.
 *
 * Every error carries a stable `code` so the HTTP layer and the worker can
 * react without string matching.
 */

export type ReportLifecycleErrorCode =
  | 'INVARIANT_VIOLATION'
  | 'NO_ACTIVE_REPORT'
  | 'ALREADY_FROZEN'
  | 'PERSISTENCE_ERROR';

export abstract class ReportLifecycleError extends Error {
  abstract readonly code: ReportLifecycleErrorCode;
}

/** An active report already exists; the caller must freeze it first. */
export class InvariantViolationError extends ReportLifecycleError {
  readonly code = 'INVARIANT_VIOLATION';
  readonly active_report_id: number;

  constructor(activeReportId: number) {
    super(`An active report already exists (report ${activeReportId})`);
    this.name = 'InvariantViolationError';
    this.active_report_id = activeReportId;
  }
}

/** Freeze was requested while no report is active. */
export class NoActiveReportError extends ReportLifecycleError {
  readonly code = 'NO_ACTIVE_REPORT';

  constructor() {
    super('No active report to freeze');
    this.name = 'NoActiveReportError';
  }
}

/** Another freeze already sealed (or is sealing) this report. */
export class AlreadyFrozenError extends ReportLifecycleError {
  readonly code = 'ALREADY_FROZEN';
  readonly report_id: number;

  constructor(reportId: number) {
    super(`Report ${reportId} is already frozen or being frozen`);
    this.name = 'AlreadyFrozenError';
    this.report_id = reportId;
  }
}

/** Underlying store failure. Nothing was committed by the failing operation. */
export class PersistenceError extends ReportLifecycleError {
  readonly code = 'PERSISTENCE_ERROR';
  readonly operation: string;

  constructor(operation: string, cause: unknown, message?: string) {
    super(message ?? `Storage operation "${operation}" failed`, { cause });
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

/**
 * The report was frozen and committed, but opening the next active report
 * failed. The system has zero active reports until the next self-heal.
 */
export class RolloverFailedError extends PersistenceError {
  readonly frozen_report_id: number;

  constructor(frozenReportId: number, cause: unknown) {
    super('create_active_report', cause, `Report ${frozenReportId} was frozen but the next active report could not be created`);
    this.name = 'RolloverFailedError';
    this.frozen_report_id = frozenReportId;
  }
}

export function isReportLifecycleError(err: unknown): err is ReportLifecycleError {
  return err instanceof ReportLifecycleError;
}

/**
 * Runs a storage call, converting any non-lifecycle failure into a
 * PersistenceError tagged with the operation name.
 */
export async function guardPersistence<T>(operation: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (err: unknown) {
    if (isReportLifecycleError(err)) throw err;
    throw new PersistenceError(operation, err);
  }
}
