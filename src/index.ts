import Fastify from 'fastify';
import pino from 'pino';
import { redisPlugin, createRedisClient, loadAgentConfig } from './infrastructure/index.js';
import { eventRoutes } from './interfaces/http/index.js';
import { PushoverAgent } from './application/index.js';

/**
 * Bootstrap the ingestion server.
 *
 * Order:
 * 1) Agent options (fail fast on invalid config)
 * 2) Redis plugin
 * 3) HTTP routes
 * 4) listen()
 *
 * Notifications are dispatched by the worker process, not here.
 */
async function main(): Promise<void> {
  const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });
  const fastify = Fastify({ loggerInstance: log });

  const options = loadAgentConfig();
  const agent = PushoverAgent.fromOptions(options, log);

  const redis = createRedisClient(process.env['REDIS_URL'] ?? 'redis://localhost:6379');
  await fastify.register(redisPlugin, { client: redis });
  await fastify.register(eventRoutes, { agent });

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({ host, port });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
