import { z } from 'zod';

/**
 * Highlight priority groups, in rendering order.
 * Types without a label entry render after all of these.
 */
export const LABEL_CATEGORIES = ['content', 'identity', 'engagement', 'system'] as const;

export type LabelCategory = (typeof LABEL_CATEGORIES)[number];

export const eventLabelSchema = z.object({
  noun: z.string().min(1),
  plural: z.string().min(1),
  verb: z.string().min(1),
  category: z.enum(LABEL_CATEGORIES),
});

export type EventLabel = z.infer<typeof eventLabelSchema>;

/** event_type → display label. Maintained outside the aggregator. */
export const eventLabelTableSchema = z.record(z.string().min(1), eventLabelSchema);

export type EventLabelTable = Readonly<Record<string, EventLabel>>;

/** Own entry for `eventType`; inherited members such as `constructor` never match. */
export function labelFor(labels: EventLabelTable, eventType: string): EventLabel | undefined {
  return Object.hasOwn(labels, eventType) ? labels[eventType] : undefined;
}

/** Sort rank of a type's category; unlabelled types rank last. */
export function categoryRank(labels: EventLabelTable, eventType: string): number {
  const label = labelFor(labels, eventType);
  if (label === undefined) return LABEL_CATEGORIES.length;
  return LABEL_CATEGORIES.indexOf(label.category);
}

/**
 * Renders one highlight line.
 *
 * Known types: "3 new posts published". Unknown types: "3 order_created events".
 */
export function formatHighlight(labels: EventLabelTable, eventType: string, count: number): string {
  const label = labelFor(labels, eventType);
  if (label === undefined) {
    return `${count} ${eventType} ${count === 1 ? 'event' : 'events'}`;
  }
  const noun = count === 1 ? label.noun : label.plural;
  return `${count} new ${noun} ${label.verb}`;
}
