import fp from 'fastify-plugin';
import type { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  client: Redis;
}

/**
 * Exposes an ioredis client as `fastify.redis` for the lifetime of the app.
 *
 * A client built with `lazyConnect` is connected on register. The plugin
 * takes ownership and quits the client when the app closes.
 */
async function redisPlugin(fastify: FastifyInstance, opts: RedisPluginOptions): Promise<void> {
  const { client } = opts;

  if (client.status === 'wait') {
    await client.connect();
    fastify.log.info('Redis connected');
  }

  fastify.decorate('redis', client);

  fastify.addHook('onClose', async () => {
    await client.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
