export { eventSchema, eventDataSchema } from './event-schema.js';
export type { EventInput, EventBody } from './event-schema.js';
export { reportSummarySchema, parseReportSummary } from './summary-schema.js';
export {
  LABEL_CATEGORIES,
  eventLabelSchema,
  eventLabelTableSchema,
  categoryRank,
  formatHighlight,
} from './event-labels.js';
export type { EventLabel, EventLabelTable, LabelCategory } from './event-labels.js';
export {
  aggregate,
  summarize,
  countByType,
  computeTrends,
  buildHighlights,
  findTopAuthors,
  roundOneDecimal,
} from './aggregator.js';
export type { NarrativeInput, NarrativeOverlay, SummarizeOptions } from './aggregator.js';
export { buildNarrativePrompt, titleCase } from './narrative-prompt.js';
export { ReportLifecycle } from './report-lifecycle.js';
export type {
  ReportLifecycleDeps,
  ReportFrozenListener,
  ReportFrozenNotice,
} from './report-lifecycle.js';
export { listEvents, listRecentEvents, countEvents, getLastEvent } from './query-events.js';
export type { ListEventsParams } from './query-events.js';
export {
  listFrozenReports,
  getReport,
  getReportEvents,
  getActiveReportSnapshot,
  acknowledgeDelivery,
} from './query-reports.js';
export type { ListReportsParams, ActiveReportSnapshot } from './query-reports.js';
export { trackEvent, appendEvent, shouldThrottle, DEFAULT_THROTTLE_SECONDS } from './track-event.js';
export type { TrackEventResult } from './track-event.js';
export { purgeExpiredEvents, DEFAULT_RETENTION_DAYS } from './retention.js';
