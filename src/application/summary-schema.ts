import { z } from 'zod';
import type { ReportSummary } from '../domain/index.js';

const trendEntrySchema = z.object({
  current: z.number().int().min(0),
  previous: z.number().int().min(0),
  change_percent: z.number().finite(),
  direction: z.enum(['up', 'down', 'same']),
});

/**
 * Schema for the persisted summary document.
 *
 * Documents written before `first_report` / `top_authors` existed still
 * parse; the missing fields get neutral defaults.
 */
export const reportSummarySchema = z.object({
  total_events: z.number().int().min(0),
  totals: z.record(z.string(), z.number().int().min(0)),
  trends: z.record(z.string(), trendEntrySchema),
  highlights: z.array(z.string()),
  first_report: z.boolean().default(false),
  top_authors: z.array(z.object({ name: z.string(), count: z.number().int().min(1) })).default([]),
  narrative: z.string().min(1).optional(),
});

/** Parses a stored `summary_data` value. `null` stays `null` (active report). */
export function parseReportSummary(raw: unknown): ReportSummary | null {
  if (raw === null || raw === undefined) return null;
  return reportSummarySchema.parse(raw);
}
