import { describe, it, expect, vi } from 'vitest';
import {
  aggregate,
  summarize,
  countByType,
  computeTrends,
  buildHighlights,
  findTopAuthors,
  roundOneDecimal,
} from '../../src/application/aggregator.js';
import { parseReportSummary } from '../../src/application/summary-schema.js';
import { fakeLogger, makeEvent, TEST_LABELS } from '../helpers.js';

function eventsOf(...types: string[]) {
  return types.map((event_type) => makeEvent({ event_type }));
}

// ─── countByType ─────────────────────────────────────────────

describe('countByType', () => {
  it('groups by type, ordered by count desc then type asc', () => {
    const totals = countByType(eventsOf('a', 'c', 'b', 'c', 'b'));

    expect(totals).toEqual({ b: 2, c: 2, a: 1 });
    expect(Object.keys(totals)).toEqual(['b', 'c', 'a']);
  });

  it('returns an empty mapping for no events', () => {
    expect(countByType([])).toEqual({});
  });
});

// ─── trends ──────────────────────────────────────────────────

describe('computeTrends', () => {
  it('reports +50% up for {A:2} → {A:3}', () => {
    expect(computeTrends({ A: 3 }, { A: 2 })).toEqual({
      A: { current: 3, previous: 2, change_percent: 50, direction: 'up' },
    });
  });

  it('reports -100% down for a type that vanished', () => {
    expect(computeTrends({}, { A: 4 })).toEqual({
      A: { current: 0, previous: 4, change_percent: -100, direction: 'down' },
    });
  });

  it('omits types with no baseline', () => {
    const trends = computeTrends({ A: 1, B: 2 }, { A: 1 });

    expect(Object.keys(trends)).toEqual(['A']);
    expect(trends['A']).toEqual({ current: 1, previous: 1, change_percent: 0, direction: 'same' });
  });

  it('rounds to one decimal', () => {
    expect(computeTrends({ A: 4 }, { A: 3 })['A']?.change_percent).toBe(33.3);
    expect(computeTrends({ A: 2 }, { A: 3 })['A']?.change_percent).toBe(-33.3);
    expect(computeTrends({ A: 7 }, { A: 6 })['A']?.change_percent).toBe(16.7);
  });

  it('derives direction from the rounded value', () => {
    const trends = computeTrends({ A: 10001, B: 10000 }, { A: 10000, B: 10001 });

    expect(trends['A']).toEqual({ current: 10001, previous: 10000, change_percent: 0, direction: 'same' });
    expect(trends['B']).toEqual({ current: 10000, previous: 10001, change_percent: 0, direction: 'same' });
  });
});

describe('roundOneDecimal', () => {
  it('rounds halves away from zero', () => {
    expect(roundOneDecimal(2.25)).toBe(2.3);
    expect(roundOneDecimal(-2.25)).toBe(-2.3);
  });

  it('never yields negative zero', () => {
    expect(Object.is(roundOneDecimal(-0.01), 0)).toBe(true);
  });
});

// ─── highlights ──────────────────────────────────────────────

describe('buildHighlights', () => {
  it('orders by category priority, then alphabetically, unlabelled last', () => {
    const highlights = buildHighlights(
      {
        plugin_updated: 1,
        comment_posted: 3,
        order_created: 2,
        post_published: 2,
        user_registered: 1,
        alpha_thing: 1,
      },
      TEST_LABELS,
    );

    expect(highlights).toEqual([
      '2 new posts published',
      '1 new user registered',
      '3 new comments posted',
      '1 new plugin update installed',
      '1 alpha_thing event',
      '2 order_created events',
    ]);
  });

  it('sorts unlabelled types by code unit, not by locale', () => {
    expect(buildHighlights({ audit_log: 1, Zulu_sync: 1 }, TEST_LABELS)).toEqual([
      '1 Zulu_sync event',
      '1 audit_log event',
    ]);
  });

  it('skips types with a zero count', () => {
    expect(buildHighlights({ post_published: 0 }, TEST_LABELS)).toEqual([]);
  });

  it('produces exactly one entry per distinct type', () => {
    const totals = { post_published: 1, user_registered: 4, custom_a: 2, custom_b: 9, comment_posted: 1 };

    expect(buildHighlights(totals, TEST_LABELS)).toHaveLength(5);
  });
});

// ─── top authors ─────────────────────────────────────────────

describe('findTopAuthors', () => {
  function published(name: string, event_type = 'post_published') {
    return makeEvent({ event_type, event_data: { context: { user_name: name } } });
  }

  it('counts post and page publishers, count desc then name asc, max 5', () => {
    const events = [
      published('carol'), published('carol'), published('carol', 'page_published'),
      published('dave'), published('dave'),
      published('bob'), published('bob'),
      published('alice'),
      published('erin'),
      published('frank'),
      makeEvent({ event_type: 'comment_posted', event_data: { context: { user_name: 'zed' } } }),
    ];

    expect(findTopAuthors(events)).toEqual([
      { name: 'carol', count: 3 },
      { name: 'bob', count: 2 },
      { name: 'dave', count: 2 },
      { name: 'alice', count: 1 },
      { name: 'erin', count: 1 },
    ]);
  });

  it('ignores events without a user name', () => {
    expect(findTopAuthors([makeEvent({ event_type: 'post_published' })])).toEqual([]);
  });
});

// ─── aggregate ───────────────────────────────────────────────

describe('aggregate', () => {
  it('marks the first report and leaves trends empty', () => {
    const summary = aggregate(eventsOf('comment_posted'), {}, TEST_LABELS);

    expect(summary).toEqual({
      total_events: 1,
      totals: { comment_posted: 1 },
      trends: {},
      highlights: ['1 new comment posted'],
      first_report: true,
      top_authors: [],
    });
  });

  it('compares against the baseline when one exists', () => {
    const summary = aggregate(eventsOf('post_published', 'post_published', 'post_published'), { post_published: 2 }, TEST_LABELS);

    expect(summary.first_report).toBe(false);
    expect(summary.trends).toEqual({
      post_published: { current: 3, previous: 2, change_percent: 50, direction: 'up' },
    });
  });

  it('summarises an empty period', () => {
    const summary = aggregate([], { post_published: 2 }, TEST_LABELS);

    expect(summary.total_events).toBe(0);
    expect(summary.highlights).toEqual([]);
    expect(summary.trends).toEqual({
      post_published: { current: 0, previous: 2, change_percent: -100, direction: 'down' },
    });
  });
});

// ─── summarize (narrative overlay) ───────────────────────────

describe('summarize', () => {
  it('attaches the trimmed narrative', async () => {
    const narrative = vi.fn().mockResolvedValue('  A busy week.  ');
    const events = eventsOf('post_published');

    const summary = await summarize(events, {}, { labels: TEST_LABELS, narrative, log: fakeLogger() });

    expect(summary.narrative).toBe('A busy week.');
    expect(narrative).toHaveBeenCalledWith({
      events,
      totals: { post_published: 1 },
      trends: {},
    });
  });

  it('does not call a disabled overlay', async () => {
    const summary = await summarize(eventsOf('post_published'), {}, { labels: TEST_LABELS, narrative: null, log: fakeLogger() });

    expect(summary).not.toHaveProperty('narrative');
  });

  it('does not call the overlay for an empty period', async () => {
    const narrative = vi.fn().mockResolvedValue('unused');

    const summary = await summarize([], {}, { labels: TEST_LABELS, narrative, log: fakeLogger() });

    expect(narrative).not.toHaveBeenCalled();
    expect(summary).not.toHaveProperty('narrative');
  });

  it('omits a blank narrative', async () => {
    const narrative = vi.fn().mockResolvedValue('   ');

    const summary = await summarize(eventsOf('post_published'), {}, { labels: TEST_LABELS, narrative, log: fakeLogger() });

    expect(summary).not.toHaveProperty('narrative');
  });

  it('logs and degrades to no narrative when the overlay fails', async () => {
    const log = fakeLogger();
    const failure = new Error('model unavailable');
    const narrative = vi.fn().mockRejectedValue(failure);

    const summary = await summarize(eventsOf('post_published'), {}, { labels: TEST_LABELS, narrative, log });

    expect(summary.totals).toEqual({ post_published: 1 });
    expect(summary).not.toHaveProperty('narrative');
    expect(log.warn).toHaveBeenCalledWith(
      { err: failure },
      'Narrative overlay failed, continuing without narrative',
    );
  });
});

// ─── free-form type names ────────────────────────────────────

describe('types named like Object.prototype members', () => {
  it('treats constructor as an unlabelled type without a baseline', () => {
    const summary = aggregate(eventsOf('constructor', 'post_published'), { post_published: 1 }, TEST_LABELS);

    expect(summary.totals).toEqual({ constructor: 1, post_published: 1 });
    expect(summary.trends).toEqual({
      post_published: { current: 1, previous: 1, change_percent: 0, direction: 'same' },
    });
    expect(summary.highlights).toEqual(['1 new post published', '1 constructor event']);
  });

  it('stores a summary that reads back after a JSON round trip', () => {
    const summary = aggregate(eventsOf('constructor', 'toString'), { post_published: 2 }, TEST_LABELS);

    const restored = parseReportSummary(JSON.parse(JSON.stringify(summary)));

    expect(restored?.totals).toEqual({ constructor: 1, toString: 1 });
    expect(restored?.trends).toEqual({
      post_published: { current: 0, previous: 2, change_percent: -100, direction: 'down' },
    });
  });

  it('ignores inherited members of the baseline', () => {
    expect(computeTrends({ toString: 3 }, { post_published: 1 })).toEqual({
      post_published: { current: 0, previous: 1, change_percent: -100, direction: 'down' },
    });
  });

  it('keeps __proto__ as an own key counted once', () => {
    const summary = aggregate(eventsOf('__proto__', 'a'), {}, TEST_LABELS);

    expect(summary.total_events).toBe(2);
    expect(Object.keys(summary.totals)).toEqual(['__proto__', 'a']);
    expect(Object.getPrototypeOf(summary.totals)).toBe(Object.prototype);
    expect(summary.highlights).toEqual(['1 __proto__ event', '1 a event']);
  });
});
