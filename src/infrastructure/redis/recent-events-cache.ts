import type { Redis } from 'ioredis';
import type { BaseLogger } from 'pino';
import { z } from 'zod';
import type { ActivityEvent } from '../../domain/index.js';
import { eventDataSchema } from '../../application/event-schema.js';

const CACHE_KEY = 'recent_unassigned_events';
const TTL_SECONDS = 300;

/**
 * Read-through cache for "newest unassigned events" lookups.
 *
 * Keyed by limit; any write to the event log invalidates every entry.
 */
export interface RecentEventsCache {
  get(limit: number): Promise<ActivityEvent[] | null>;
  set(limit: number, events: readonly ActivityEvent[]): Promise<void>;
  invalidate(): Promise<void>;
}

const cachedEventSchema = z.object({
  id: z.number().int(),
  event_type: z.string(),
  event_subtype: z.string().nullable(),
  object_id: z.string().nullable(),
  user_id: z.string().nullable(),
  event_data: eventDataSchema,
  event_timestamp: z.coerce.date(),
  report_id: z.number().int().nullable(),
  source_plugin: z.string(),
});

const cachedEventsSchema = z.array(cachedEventSchema);

/**
 * Redis-backed cache: one hash, one field per limit, 5-minute TTL.
 *
 * Best-effort: Redis failures are logged and treated as a miss so the
 * caller falls through to the database.
 */
export class RedisRecentEventsCache implements RecentEventsCache {
  private readonly redis: Redis;
  private readonly log: BaseLogger;

  constructor(redis: Redis, log: BaseLogger) {
    this.redis = redis;
    this.log = log;
  }

  async get(limit: number): Promise<ActivityEvent[] | null> {
    try {
      const raw = await this.redis.hget(CACHE_KEY, String(limit));
      if (raw === null) return null;

      const parsed = cachedEventsSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.log.warn({ limit }, 'Discarding malformed recent-events cache entry');
        return null;
      }
      return parsed.data;
    } catch (err: unknown) {
      this.log.warn({ err, limit }, 'Recent-events cache read failed');
      return null;
    }
  }

  async set(limit: number, events: readonly ActivityEvent[]): Promise<void> {
    try {
      await this.redis.hset(CACHE_KEY, String(limit), JSON.stringify(events));
      await this.redis.expire(CACHE_KEY, TTL_SECONDS);
    } catch (err: unknown) {
      this.log.warn({ err, limit }, 'Recent-events cache write failed');
    }
  }

  async invalidate(): Promise<void> {
    try {
      await this.redis.del(CACHE_KEY);
    } catch (err: unknown) {
      this.log.warn({ err }, 'Recent-events cache invalidation failed');
    }
  }
}
