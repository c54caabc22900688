export { startConsumer, processBatch, parseStreamEntry, reportHealth } from './stream-consumer.js';
