import { vi } from 'vitest';
import type { BaseLogger } from 'pino';
import type { ActivityEvent } from '../src/domain/index.js';
import type { EventLabelTable } from '../src/application/index.js';

let counter = 0;

/**
 * Factory for activity events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<ActivityEvent> = {}): ActivityEvent {
  counter++;
  return {
    id: overrides.id ?? counter,
    event_type: overrides.event_type ?? 'post_published',
    event_subtype: overrides.event_subtype ?? null,
    object_id: overrides.object_id ?? null,
    user_id: overrides.user_id ?? null,
    event_data: overrides.event_data ?? {},
    event_timestamp: overrides.event_timestamp ?? new Date('2026-03-02T10:00:00Z'),
    report_id: overrides.report_id ?? null,
    source_plugin: overrides.source_plugin ?? 'core',
  };
}

export function fakeLogger() {
  return {
    level: 'info',
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    silent: vi.fn(),
  } as unknown as BaseLogger;
}

/** Manually advanced clock. */
export function fixedClock(startIso: string) {
  let current = new Date(startIso).getTime();
  return {
    now: (): Date => new Date(current),
    advance(ms: number): void {
      current += ms;
    },
  };
}

export const TEST_LABELS: EventLabelTable = {
  post_published: { noun: 'post', plural: 'posts', verb: 'published', category: 'content' },
  user_registered: { noun: 'user', plural: 'users', verb: 'registered', category: 'identity' },
  comment_posted: { noun: 'comment', plural: 'comments', verb: 'posted', category: 'engagement' },
  plugin_updated: { noun: 'plugin update', plural: 'plugin updates', verb: 'installed', category: 'system' },
};
