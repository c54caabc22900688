import pino from 'pino';
import { createRedisClient, loadAgentConfig, startConsumer } from './infrastructure/index.js';
import { PushoverAgent } from './application/index.js';

/**
 * Standalone worker that consumes events from the Redis stream and
 * dispatches them to Pushover.
 *
 * Batches are processed one at a time, each event to completion before the
 * next. Scale out by running more instances with distinct WORKER_ID values.
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

const redis = createRedisClient(process.env['REDIS_URL'] ?? 'redis://localhost:6379');

const ac = new AbortController();

async function main(): Promise<void> {
  const options = loadAgentConfig();
  const agent = PushoverAgent.fromOptions(options, log);
  log.info(
    { expected_receive_period_in_days: options.expected_receive_period_in_days },
    'Pushover agent configured',
  );

  await redis.connect();
  log.info('Redis connected');

  await startConsumer(redis, log, ac.signal, agent);
}

function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();

  // The consumer may be blocked in XREADGROUP for up to 5s
  setTimeout(async () => {
    await redis.quit().catch(() => {});
    process.exit(0);
  }, 6000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
