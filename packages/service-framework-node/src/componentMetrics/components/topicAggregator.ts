import type { MetricConfigCounter, MetricConfigGauge } from '../../metrics/types.js';

const contentChunksTotal: MetricConfigCounter = {
  type: 'counter',
  name: 'content_chunks_total',
  help: 'Broadcast chunks folded into the running totals',
};

const aggregatedCount: MetricConfigGauge<'kind'> = {
  type: 'gauge',
  name: 'aggregated_count',
  help: 'Running totals for the topic (lines, words, chars, docs)',
  labelNames: ['kind'] as const,
};

export const topicAggregatorMetrics = {
  contentChunksTotal,
  aggregatedCount,
};
