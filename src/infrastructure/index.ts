export { redisPlugin, createRedisClient, enqueueEvent, STREAM_KEY, WORKER_HEALTH_KEY } from './redis/index.js';
export type { WorkerHealth, RedisPluginOptions } from './redis/index.js';
export { loadAgentConfig, parseSimpleYaml } from './config/index.js';
export {
  ImageAttachment,
  fetchAttachment,
  sendNotification,
  redactParams,
  PUSHOVER_API_URL,
  MAX_ATTACHMENT_BYTES,
} from './pushover/index.js';
export type { DispatchResult } from './pushover/index.js';
export { startConsumer, processBatch, parseStreamEntry, reportHealth } from './worker/index.js';
