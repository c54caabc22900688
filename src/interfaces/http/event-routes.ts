import { randomUUID } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { eventSchema, eventBatchSchema } from '../../application/index.js';
import type { EventInput, PushoverAgent } from '../../application/index.js';
import { enqueueEvent, WORKER_HEALTH_KEY } from '../../infrastructure/redis/index.js';
import { redactParams } from '../../infrastructure/pushover/index.js';
import type { Event } from '../../domain/index.js';

export interface EventRoutesOptions {
  /** Used only for dry runs; nothing is sent from the HTTP process. */
  agent: PushoverAgent;
}

function toEvent(input: EventInput): Event {
  return {
    ...input,
    event_id: input.event_id ?? randomUUID(),
  };
}

/**
 * Registers the event ingestion routes.
 *
 * POST /api/v1/events          — single event ingestion
 * POST /api/v1/events/batch    — batch ingestion (array of events)
 * POST /api/v1/events/dry-run  — render parameters without sending
 * GET  /api/v1/health          — Redis connectivity and worker liveness
 */
async function eventRoutes(fastify: FastifyInstance, opts: EventRoutesOptions): Promise<void> {

  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = toEvent(parsed.data);
      await enqueueEvent(fastify.redis, event);

      return reply.status(202).send({
        status: 'accepted',
        event_id: event.event_id,
      });
    },
  );

  /**
   * Batch ingestion. The whole array is validated first; one invalid
   * event rejects the batch. Events are enqueued in order.
   */
  fastify.post(
    '/api/v1/events/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const events = parsed.data.map(toEvent);
      for (const event of events) {
        await enqueueEvent(fastify.redis, event);
      }

      return reply.status(202).send({
        status: 'accepted',
        count: events.length,
        event_ids: events.map((e) => e.event_id),
      });
    },
  );

  fastify.post(
    '/api/v1/events/dry-run',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = eventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const prepared = opts.agent.prepare(toEvent(parsed.data));
      if (prepared === null) {
        return reply.status(200).send({ status: 'skipped' });
      }

      return reply.status(200).send({
        status: 'ready',
        params: redactParams(prepared.params),
        image_url: prepared.imageUrl ?? null,
      });
    },
  );

  /**
   * Health check: Redis PING, plus the worker's liveness as last
   * published under `worker:health`. A missing key means the worker is
   * down or has not reported yet.
   */
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        const pong = await fastify.redis.ping();
        const workerHealth = await fastify.redis.get(WORKER_HEALTH_KEY);
        const worker = workerHealth === 'ok' || workerHealth === 'degraded' ? workerHealth : 'unknown';

        return reply.status(200).send({ status: 'ok', redis: pong, worker });
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        return reply.status(503).send({ status: 'degraded', redis: 'unreachable', worker: 'unknown' });
      }
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['redis'],
  fastify: '5.x',
});
