import { z } from 'zod';

/**
 * Zod schema for an inbound event envelope.
 *
 * `event_id` is optional at ingestion and assigned by the route when absent.
 * The payload is what notification templates render against, so it stays
 * an open record.
 */
export const eventSchema = z.object({
  event_id: z.string().uuid().optional(),
  event_type: z.string().min(1).max(255),
  source: z.string().min(1).max(255),
  timestamp: z
    .string()
    .datetime({ message: 'Must be a valid ISO-8601 datetime' })
    .default(() => new Date().toISOString()),
  payload: z.record(z.string(), z.unknown()).default({}),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

export type EventInput = z.infer<typeof eventSchema>;

export const eventBatchSchema = z.array(eventSchema).min(1, 'Batch must contain at least one event');
