/**
 * Core domain types for the inbound event model.
 *
 * Events arrive over HTTP, wait on the Redis stream, and are rendered into
 * one Pushover notification each. They are never mutated.
 */

/** Free-form key/value payload attached to every event. */
export type EventPayload = Record<string, unknown>;

/** Optional metadata for routing, tracing, or enrichment. */
export type EventMetadata = Record<string, unknown>;

/**
 * Canonical Event entity.
 *
 * `event_id` is assigned at ingestion time if the producer does not
 * supply one, so every enqueued event is addressable in the logs.
 */
export interface Event {
  readonly event_id: string;
  readonly event_type: string;
  readonly source: string;
  readonly timestamp: string; // ISO-8601
  readonly payload: EventPayload;
  readonly metadata: EventMetadata;
}

/** Envelope fields exposed to templates under the `event` key. */
export type EventEnvelope = Pick<Event, 'event_id' | 'event_type' | 'source' | 'timestamp' | 'metadata'>;

/**
 * What a field template renders against: payload keys at the top level,
 * plus the envelope under `event`. Payload keys win on collision, so a
 * payload may shadow `event` itself.
 */
export type TemplateContext = EventPayload & { event?: unknown };

export function toTemplateContext(event: Event): TemplateContext {
  const envelope: EventEnvelope = {
    event_id: event.event_id,
    event_type: event.event_type,
    source: event.source,
    timestamp: event.timestamp,
    metadata: event.metadata,
  };
  return { event: envelope, ...event.payload };
}
