import type { NarrativeInput } from './aggregator.js';

const MAX_RECENT_EVENTS = 10;

/** "post_published" → "Post Published" */
export function titleCase(eventType: string): string {
  return eventType
    .split('_')
    .filter((part) => part !== '')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

function describeObject(object: Record<string, unknown> | undefined): string {
  if (object === undefined) return '';
  const parts: string[] = [];
  for (const key of ['type', 'title', 'name', 'id']) {
    const value = object[key];
    if (typeof value === 'string' || typeof value === 'number') {
      parts.push(`${key}: ${value}`);
    }
  }
  return parts.join(', ');
}

/**
 * Builds the prompt handed to the narrative model.
 *
 * Sections: event summary, breakdown, trends (non-flat only), up to ten of
 * the most recent events, instructions.
 */
export function buildNarrativePrompt(input: NarrativeInput): string {
  const lines: string[] = [
    'You are a friendly coworker reviewing site activity for the past period. ' +
      "Write a conversational summary as if you're telling a colleague what happened on their website. " +
      "Use 'you' to address them directly and keep it concise (3-5 sentences max). " +
      "Don't list every event - highlight the main activities.",
    '',
    '## Event Summary',
    `Total events this period: ${input.events.length}`,
    '',
  ];

  const totals = Object.entries(input.totals);
  if (totals.length > 0) {
    lines.push('Event breakdown:');
    for (const [type, count] of totals) {
      lines.push(`- ${titleCase(type)}: ${count}`);
    }
    lines.push('');
  }

  const movingTrends = Object.entries(input.trends).filter(([, trend]) => trend.direction !== 'same');
  if (movingTrends.length > 0) {
    lines.push('## Trends vs. Last Period');
    for (const [type, trend] of movingTrends) {
      const arrow = trend.direction === 'up' ? '↑' : '↓';
      lines.push(
        `- ${titleCase(type)}: ${arrow} ${Math.abs(trend.change_percent)}% (${trend.previous} → ${trend.current})`,
      );
    }
    lines.push('');
  }

  lines.push('## Recent Events');
  for (const event of input.events.slice(0, MAX_RECENT_EVENTS)) {
    const action = event.event_data.action ?? titleCase(event.event_type);
    const object = describeObject(event.event_data.object);
    lines.push(object === '' ? `- ${titleCase(event.event_type)}: ${action}` : `- ${titleCase(event.event_type)}: ${action} (${object})`);
  }

  lines.push(
    '',
    '## Instructions',
    'Write a friendly 3-5 sentence summary highlighting the most important activities. ' +
      'Mention trends if significant. Use a warm, encouraging tone.',
  );

  return lines.join('\n');
}
