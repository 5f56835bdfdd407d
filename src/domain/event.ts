/**
 * Core domain types for the activity event model.
 *
 * These types define the canonical shape of an activity event as it flows
 * through the system. They carry no framework dependencies.
 */

/**
 * Structured payload attached to every event.
 *
 * `action`, `object` and `context` are read by the aggregator and the
 * narrative prompt; any other key is carried through untouched.
 */
export interface EventData {
  readonly action?: string;
  readonly object?: Record<string, unknown>;
  readonly context?: Record<string, unknown>;
  readonly metadata?: Record<string, unknown>;
  readonly [key: string]: unknown;
}

/**
 * Canonical activity event.
 *
 * `report_id === null` means the event has not been claimed by any report.
 * Once set it never changes.
 */
export interface ActivityEvent {
  readonly id: number;
  readonly event_type: string;
  readonly event_subtype: string | null;
  readonly object_id: string | null;
  readonly user_id: string | null;
  readonly event_data: EventData;
  readonly event_timestamp: Date;
  readonly report_id: number | null;
  readonly source_plugin: string;
}

/** Fields a producer supplies; the store assigns `id` and `report_id`. */
export interface NewActivityEvent {
  event_type: string;
  event_subtype?: string | null;
  object_id?: string | null;
  user_id?: string | null;
  event_data?: EventData;
  event_timestamp?: Date;
  source_plugin?: string;
}

/** event_type → number of events. */
export type EventTotals = Record<string, number>;
