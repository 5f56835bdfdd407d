import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadEventLabels, DEFAULT_EVENT_LABELS_PATH } from '../../src/infrastructure/config/event-labels.js';
import { fakeLogger } from '../helpers.js';

describe('loadEventLabels', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'event-labels-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads the bundled table', () => {
    const labels = loadEventLabels(fakeLogger());

    expect(Object.keys(labels)).toHaveLength(18);
    expect(labels['post_published']).toEqual({
      noun: 'post',
      plural: 'posts',
      verb: 'published',
      category: 'content',
    });
    expect(labels['theme_switched']?.category).toBe('system');
  });

  it('prefers a valid custom table', () => {
    const path = join(dir, 'custom.json');
    writeFileSync(path, JSON.stringify({
      order_created: { noun: 'order', plural: 'orders', verb: 'placed', category: 'engagement' },
    }));

    expect(loadEventLabels(fakeLogger(), path)).toEqual({
      order_created: { noun: 'order', plural: 'orders', verb: 'placed', category: 'engagement' },
    });
  });

  it('falls back to the bundled table when the custom one is invalid', () => {
    const path = join(dir, 'invalid.json');
    writeFileSync(path, JSON.stringify({ order_created: { noun: 'order', category: 'sales' } }));
    const log = fakeLogger();

    const labels = loadEventLabels(log, path);

    expect(labels['post_published']?.verb).toBe('published');
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ path }),
      'Event label table unusable, falling back to bundled table',
    );
  });

  it('returns an empty table when no file is readable', () => {
    const log = fakeLogger();

    const labels = loadEventLabels(log, join(dir, 'missing.json'), join(dir, 'also-missing.json'));

    expect(labels).toEqual({});
    expect(log.warn).toHaveBeenCalledTimes(2);
  });

  it('resolves the bundled path from the working directory', () => {
    expect(DEFAULT_EVENT_LABELS_PATH).toBe(join(process.cwd(), 'config', 'event-labels.json'));
  });
});
