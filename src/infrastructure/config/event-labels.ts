import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { BaseLogger } from 'pino';
import { eventLabelTableSchema } from '../../application/event-labels.js';
import type { EventLabelTable } from '../../application/event-labels.js';

/** Label table shipped with the service. */
export const DEFAULT_EVENT_LABELS_PATH = resolve(process.cwd(), 'config', 'event-labels.json');

function readLabelTable(filePath: string): EventLabelTable {
  const content = readFileSync(filePath, 'utf-8');
  return eventLabelTableSchema.parse(JSON.parse(content));
}

/**
 * Loads the event-type label table.
 *
 * A missing or invalid custom table falls back to the bundled one. If that
 * is unreadable too, every type renders with the generic highlight.
 */
export function loadEventLabels(
  log: BaseLogger,
  configPath: string | null = null,
  defaultPath: string = DEFAULT_EVENT_LABELS_PATH,
): EventLabelTable {
  if (configPath !== null && resolve(configPath) !== resolve(defaultPath)) {
    try {
      const labels = readLabelTable(configPath);
      log.info({ path: configPath, types: Object.keys(labels).length }, 'Event labels loaded');
      return labels;
    } catch (err: unknown) {
      log.warn({ err, path: configPath }, 'Event label table unusable, falling back to bundled table');
    }
  }

  try {
    return readLabelTable(defaultPath);
  } catch (err: unknown) {
    log.warn({ err, path: defaultPath }, 'Bundled event label table unusable, highlights use generic labels');
    return {};
  }
}
