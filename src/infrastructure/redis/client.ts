import { Redis } from 'ioredis';

/**
 * Builds the ioredis client shared by the server and the worker.
 *
 * The client starts disconnected; callers connect when they are ready.
 * `maxRetriesPerRequest: null` keeps blocking XREADGROUP calls alive
 * across reconnects.
 */
export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
