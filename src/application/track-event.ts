import type { EventStore } from '../domain/index.js';
import { eventSchema } from './event-schema.js';
import type { EventInput } from './event-schema.js';

export const DEFAULT_THROTTLE_SECONDS = 3600;

export type TrackEventResult =
  | { readonly ok: true; readonly event_id: number }
  | { readonly ok: false; readonly issues: readonly { path: (string | number)[]; message: string }[] };

/**
 * Use case: validate a producer's event and append it.
 *
 * Returns a discriminated result so the caller decides how to surface
 * validation errors. Storage failures propagate as PersistenceError.
 */
export async function trackEvent(events: EventStore, body: unknown): Promise<TrackEventResult> {
  const parsed = eventSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    };
  }

  const event_id = await appendEvent(events, parsed.data);
  return { ok: true, event_id };
}

/** Appends an already-validated event. */
export async function appendEvent(events: EventStore, input: EventInput): Promise<number> {
  return events.append({
    event_type: input.event_type,
    event_subtype: input.event_subtype ?? null,
    object_id: input.object_id,
    user_id: input.user_id,
    event_data: input.event_data,
    event_timestamp: input.event_timestamp,
    source_plugin: input.source_plugin,
  });
}

/**
 * True when the newest `eventType` event for `objectId` is younger than
 * `windowSeconds`. Producers use it to drop repeated edits of one object.
 */
export async function shouldThrottle(
  events: EventStore,
  eventType: string,
  objectId: string,
  windowSeconds: number = DEFAULT_THROTTLE_SECONDS,
  now: Date = new Date(),
): Promise<boolean> {
  const last = await events.lastEventFor(eventType, objectId);
  if (last === null) return false;
  return now.getTime() - last.event_timestamp.getTime() < windowSeconds * 1000;
}
