import type { BaseLogger } from 'pino';
import type {
  ActivityEvent,
  EventTotals,
  ReportSummary,
  TopAuthor,
  TrendDirection,
  TrendEntry,
} from '../domain/index.js';
import type { EventLabelTable } from './event-labels.js';
import { categoryRank, formatHighlight } from './event-labels.js';

const MAX_TOP_AUTHORS = 5;

/** Event types whose `context.user_name` counts toward top authors. */
const AUTHORED_TYPES: ReadonlySet<string> = new Set(['post_published', 'page_published']);

/** Input handed to the narrative overlay. */
export interface NarrativeInput {
  readonly events: readonly ActivityEvent[];
  readonly totals: EventTotals;
  readonly trends: Readonly<Record<string, TrendEntry>>;
}

/**
 * Optional collaborator producing a natural-language summary.
 * Resolves to `null` when it has nothing to say. Must not touch storage.
 */
export type NarrativeOverlay = (input: NarrativeInput) => Promise<string | null>;

export interface SummarizeOptions {
  labels: EventLabelTable;
  /** `null` disables the overlay. */
  narrative: NarrativeOverlay | null;
  log: BaseLogger;
}

/** Code-unit order, identical on every host regardless of locale. */
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/** Count for `type`, reading own keys only: types are free-form strings. */
function countOf(totals: EventTotals, type: string): number {
  return Object.hasOwn(totals, type) ? totals[type] ?? 0 : 0;
}

/**
 * Groups events by type.
 * Result is ordered by count descending, then type ascending.
 */
export function countByType(events: readonly ActivityEvent[]): EventTotals {
  const counts = new Map<string, number>();
  for (const event of events) {
    counts.set(event.event_type, (counts.get(event.event_type) ?? 0) + 1);
  }

  const sorted = [...counts.entries()].sort(
    ([typeA, countA], [typeB, countB]) => countB - countA || compareText(typeA, typeB),
  );

  return Object.fromEntries(sorted);
}

/** Rounds half away from zero to one decimal. Never returns -0. */
export function roundOneDecimal(value: number): number {
  const rounded = (Math.sign(value) * Math.round(Math.abs(value) * 10)) / 10;
  return rounded === 0 ? 0 : rounded;
}

function directionOf(changePercent: number): TrendDirection {
  if (changePercent > 0) return 'up';
  if (changePercent < 0) return 'down';
  return 'same';
}

/**
 * Period-over-period trends against the previous report's totals.
 *
 * Only types with a non-zero baseline get an entry: a type with
 * `previous == 0` has no meaningful percentage and is left out. A type that
 * vanished this period reports -100%.
 */
export function computeTrends(
  totals: EventTotals,
  previousTotals: EventTotals,
): Record<string, TrendEntry> {
  const types = new Set([...Object.keys(totals), ...Object.keys(previousTotals)]);
  const trends: [string, TrendEntry][] = [];

  for (const type of [...types].sort(compareText)) {
    const current = countOf(totals, type);
    const previous = countOf(previousTotals, type);
    if (previous <= 0) continue;

    const change_percent = roundOneDecimal(((current - previous) / previous) * 100);
    trends.push([type, {
      current,
      previous,
      change_percent,
      direction: directionOf(change_percent),
    }]);
  }

  return Object.fromEntries(trends);
}

/**
 * One highlight per type with a positive count, in category priority order
 * (content, identity, engagement, system, unlabelled), alphabetical inside
 * a category.
 */
export function buildHighlights(totals: EventTotals, labels: EventLabelTable): string[] {
  return Object.entries(totals)
    .filter(([, count]) => count > 0)
    .sort(([typeA], [typeB]) =>
      categoryRank(labels, typeA) - categoryRank(labels, typeB) || compareText(typeA, typeB),
    )
    .map(([type, count]) => formatHighlight(labels, type, count));
}

/** Top publishers, read from `event_data.context.user_name`. */
export function findTopAuthors(events: readonly ActivityEvent[]): TopAuthor[] {
  const counts = new Map<string, number>();
  for (const event of events) {
    if (!AUTHORED_TYPES.has(event.event_type)) continue;
    const name = event.event_data.context?.['user_name'];
    if (typeof name !== 'string' || name === '') continue;
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([nameA, countA], [nameB, countB]) => countB - countA || compareText(nameA, nameB))
    .slice(0, MAX_TOP_AUTHORS)
    .map(([name, count]) => ({ name, count }));
}

/**
 * Pure aggregation pass: totals, trends, highlights, authors.
 *
 * An empty `previousTotals` marks the first report; trends are then empty
 * because there is nothing to compare against.
 */
export function aggregate(
  events: readonly ActivityEvent[],
  previousTotals: EventTotals,
  labels: EventLabelTable,
): ReportSummary {
  const totals = countByType(events);
  const first_report = Object.keys(previousTotals).length === 0;

  return {
    total_events: events.length,
    totals,
    trends: first_report ? {} : computeTrends(totals, previousTotals),
    highlights: buildHighlights(totals, labels),
    first_report,
    top_authors: findTopAuthors(events),
  };
}

/**
 * Aggregates a batch of events and attaches the overlay narrative.
 *
 * The overlay runs only when configured and `events` is non-empty. A failing
 * or empty overlay leaves the summary without `narrative`.
 */
export async function summarize(
  events: readonly ActivityEvent[],
  previousTotals: EventTotals,
  options: SummarizeOptions,
): Promise<ReportSummary> {
  const summary = aggregate(events, previousTotals, options.labels);

  if (options.narrative === null || events.length === 0) {
    return summary;
  }

  try {
    const narrative = await options.narrative({
      events,
      totals: summary.totals,
      trends: summary.trends,
    });
    if (narrative === null || narrative.trim() === '') {
      return summary;
    }
    return { ...summary, narrative: narrative.trim() };
  } catch (err: unknown) {
    options.log.warn({ err }, 'Narrative overlay failed, continuing without narrative');
    return summary;
  }
}
