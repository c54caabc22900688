/** Redis keys shared by the HTTP server and the worker. */
export const STREAM_KEY = 'events_stream';
export const WORKER_HEALTH_KEY = 'worker:health';

export type WorkerHealth = 'ok' | 'degraded';
