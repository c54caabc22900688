import type { Redis } from 'ioredis';
import type { Event } from '../../domain/index.js';
import { STREAM_KEY } from './keys.js';

/**
 * Appends an event to the stream the worker consumes.
 *
 * Stream values must be strings, so payload and metadata travel as JSON.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function enqueueEvent(redis: Redis, event: Event): Promise<string> {
  const entryId = await redis.xadd(
    STREAM_KEY,
    '*',
    'event_id', event.event_id,
    'event_type', event.event_type,
    'source', event.source,
    'timestamp', event.timestamp,
    'payload', JSON.stringify(event.payload),
    'metadata', JSON.stringify(event.metadata),
  );

  if (entryId === null) {
    throw new Error(`XADD to ${STREAM_KEY} returned no entry id`);
  }
  return entryId;
}
