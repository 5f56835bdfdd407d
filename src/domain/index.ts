export type { ActivityEvent, EventData, EventTotals, NewActivityEvent } from './event.js';
export type {
  Report,
  ReportStatus,
  ReportSummary,
  TopAuthor,
  TrendDirection,
  TrendEntry,
} from './report.js';
export type {
  EventStore,
  FreezeCompletion,
  OpenedReport,
  PaginationParams,
  ReportStore,
  ReportingStorage,
} from './storage.js';
export {
  AlreadyFrozenError,
  InvariantViolationError,
  NoActiveReportError,
  PersistenceError,
  ReportLifecycleError,
  RolloverFailedError,
  guardPersistence,
  isReportLifecycleError,
} from './errors.js';
export type { ReportLifecycleErrorCode } from './errors.js';
