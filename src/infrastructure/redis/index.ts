export { default as redisPlugin } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { createRedisClient } from './client.js';
export { enqueueEvent } from './event-producer.js';
export { STREAM_KEY, WORKER_HEALTH_KEY } from './keys.js';
export type { WorkerHealth } from './keys.js';
