import { z } from 'zod';

/**
 * Envelope for `event_data`.
 *
 * `action`, `object` and `context` are the fields the aggregator reads.
 * Unknown keys pass through so producers can attach anything else.
 */
export const eventDataSchema = z.object({
  action: z.string().min(1).optional(),
  object: z.record(z.string(), z.unknown()).optional(),
  context: z.record(z.string(), z.unknown()).optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
}).passthrough();

/**
 * Zod schema for a single inbound event.
 *
 * - `event_type` is free-form: new producers may introduce types at any time.
 *   `__proto__` is refused; it cannot survive as a key of the stored summary.
 * - `event_timestamp` is optional; the store stamps the insert time when absent.
 * - Correlation fields accept numbers and are stored as strings.
 */
export const eventSchema = z.object({
  event_type: z.string().min(1).max(50)
    .refine((v) => v !== '__proto__', { message: 'event_type "__proto__" is reserved' }),
  event_subtype: z.string().min(1).max(50).nullish(),
  object_id: z.union([z.string().min(1).max(64), z.number().int()]).nullish()
    .transform((v) => (v === undefined || v === null ? null : String(v))),
  user_id: z.union([z.string().min(1).max(64), z.number().int()]).nullish()
    .transform((v) => (v === undefined || v === null ? null : String(v))),
  event_data: eventDataSchema.default({}),
  event_timestamp: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' })
    .transform((v) => new Date(v))
    .optional(),
  source_plugin: z.string().min(1).max(100).optional(),
});

/** Validated producer input, ready for `EventStore.append`. */
export type EventInput = z.infer<typeof eventSchema>;

/** Raw body shape accepted before validation. */
export type EventBody = z.input<typeof eventSchema>;
