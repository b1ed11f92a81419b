export { createTopicAggregator } from './lib/aggregator.js';
export type { TopicAggregator } from './lib/aggregator.js';
export { createMetricsRequestHandler } from './lib/metricsRequestHandler.js';
