import type { EventTotals } from './event.js';

export type ReportStatus = 'active' | 'frozen';

export type TrendDirection = 'up' | 'down' | 'same';

/** Period-over-period change for one event type. */
export interface TrendEntry {
  readonly current: number;
  readonly previous: number;
  readonly change_percent: number;
  readonly direction: TrendDirection;
}

export interface TopAuthor {
  readonly name: string;
  readonly count: number;
}

/**
 * Persisted summary document.
 *
 * Field names are read by downstream renderers and must stay stable.
 * `narrative` is present only when the narrative overlay produced text.
 */
export interface ReportSummary {
  readonly total_events: number;
  readonly totals: EventTotals;
  readonly trends: Record<string, TrendEntry>;
  readonly highlights: readonly string[];
  readonly first_report: boolean;
  readonly top_authors: readonly TopAuthor[];
  readonly narrative?: string;
}

/**
 * Report record.
 *
 * Created `active` with no summary, frozen exactly once, never reopened.
 */
export interface Report {
  readonly id: number;
  readonly status: ReportStatus;
  readonly period_start: Date;
  readonly period_end: Date | null;
  readonly frozen_at: Date | null;
  readonly event_count: number;
  readonly summary_data: ReportSummary | null;
  readonly emailed: boolean;
  readonly emailed_at: Date | null;
  readonly created_at: Date;
}
