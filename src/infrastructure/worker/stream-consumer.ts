import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Event } from '../../domain/index.js';
import type { PushoverAgent } from '../../application/pushover-agent.js';
import { STREAM_KEY, WORKER_HEALTH_KEY } from '../redis/keys.js';
import type { WorkerHealth } from '../redis/keys.js';

const GROUP_NAME = 'pushover_dispatch';
const CONSUMER_NAME = process.env['WORKER_ID'] ?? 'worker-1';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages handed to the agent as one batch
const BATCH_SIZE = 100;
// worker:health expires if the worker stops reporting
const HEALTH_TTL_SECONDS = 120;

/**
 * Ensures the consumer group exists, created from "$" so only events
 * arriving after the first boot are dispatched. BUSYGROUP is ignored.
 */
async function ensureConsumerGroup(redis: Redis, log: Logger): Promise<void> {
  try {
    await redis.xgroup('CREATE', STREAM_KEY, GROUP_NAME, '$', 'MKSTREAM');
    log.info({ group: GROUP_NAME, stream: STREAM_KEY }, 'Consumer group created (from $)');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group: GROUP_NAME }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

function parseJsonRecord(raw: string | undefined, field: string): Record<string, unknown> {
  const value: unknown = JSON.parse(raw ?? '{}');
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Stream field "${field}" is not a JSON object`);
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Parses a flat [field, value, field, value, ...] stream entry.
 * Throws when payload or metadata is not a JSON object.
 */
export function parseStreamEntry(fields: string[]): Event {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  return {
    event_id: map.get('event_id') ?? '',
    event_type: map.get('event_type') ?? '',
    source: map.get('source') ?? '',
    timestamp: map.get('timestamp') ?? '',
    payload: parseJsonRecord(map.get('payload'), 'payload'),
    metadata: parseJsonRecord(map.get('metadata'), 'metadata'),
  };
}

type StreamEntry = [id: string, fields: string[]];
type StreamReply = Array<[stream: string, entries: StreamEntry[]]>;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isStreamEntry(value: unknown): value is StreamEntry {
  return Array.isArray(value) && typeof value[0] === 'string' && isStringArray(value[1]);
}

/** Narrows the untyped XREADGROUP reply to [stream, entries][] form. */
export function isStreamReply(value: unknown): value is StreamReply {
  return Array.isArray(value) && value.every(
    (stream) =>
      Array.isArray(stream) &&
      typeof stream[0] === 'string' &&
      Array.isArray(stream[1]) &&
      stream[1].every(isStreamEntry),
  );
}

/** Dependencies bundled for internal functions. */
export interface ConsumerDeps {
  redis: Redis;
  log: Logger;
  agent: PushoverAgent;
}

/**
 * Parses the entries read in one call, runs them through the agent as a
 * single batch, and acknowledges all of them. Malformed entries are logged
 * and acknowledged without being dispatched.
 */
export async function processBatch(
  deps: ConsumerDeps,
  entries: StreamEntry[],
): Promise<void> {
  const events: Event[] = [];
  for (const [streamId, fields] of entries) {
    try {
      events.push(parseStreamEntry(fields));
    } catch (err: unknown) {
      deps.log.warn({ err, streamId }, 'Malformed stream entry, dropping');
    }
  }

  try {
    const summary = await deps.agent.receive(events);
    deps.log.info({ ...summary, count: events.length }, 'Batch dispatched');
  } finally {
    const ids = entries.map(([streamId]) => streamId);
    if (ids.length > 0) {
      await deps.redis.xack(STREAM_KEY, GROUP_NAME, ...ids);
    }
  }
}

/** Publishes the agent's liveness for the HTTP health route. */
export async function reportHealth(deps: ConsumerDeps): Promise<WorkerHealth> {
  const health: WorkerHealth = deps.agent.isWorking() ? 'ok' : 'degraded';
  await deps.redis.set(WORKER_HEALTH_KEY, health, 'EX', HEALTH_TTL_SECONDS);
  return health;
}

/**
 * Main consumer loop.
 *
 * XREADGROUP (BLOCK) → agent.receive(batch) → XACK → report health.
 * Entries are acknowledged whether or not their notifications went out;
 * delivery is not retried.
 *
 * The loop runs until `signal` is aborted.
 */
export async function startConsumer(
  redis: Redis,
  log: Logger,
  signal: AbortSignal,
  agent: PushoverAgent,
): Promise<void> {
  const deps: ConsumerDeps = { redis, log, agent };

  await ensureConsumerGroup(redis, log);

  log.info(
    { consumer: CONSUMER_NAME, group: GROUP_NAME, stream: STREAM_KEY },
    'Consumer started',
  );

  while (!signal.aborted) {
    try {
      const response = await redis.xreadgroup(
        'GROUP', GROUP_NAME, CONSUMER_NAME,
        'COUNT', BATCH_SIZE,
        'BLOCK', BLOCK_MS,
        'STREAMS', STREAM_KEY,
        '>',
      );

      // null = timeout with no new messages
      if (isStreamReply(response)) {
        for (const [, entries] of response) {
          await processBatch(deps, entries);
        }
      } else if (response !== null) {
        log.warn({ response }, 'Unexpected XREADGROUP reply shape');
      }

      await reportHealth(deps);
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Consumer loop error, retrying in 1s');
      await sleep(1000);
    }
  }

  log.info('Consumer stopped');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
