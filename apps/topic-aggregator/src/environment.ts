import type { SF } from '@doc-analytics/service-framework-node';
import { TB } from '@doc-analytics/service-framework-node/typebox';

export const topicAggregatorEnvSchema = TB.Object({
  PROCESS_NAME: TB.String({ default: 'topic-aggregator' }),
  NODE_ENV: TB.String({ default: 'development' }),
  PORT: TB.Integer({ default: 3002 }),
  LOG_LEVEL: TB.String({ default: 'info' }),
  LOG_FORMAT: TB.String({ default: 'human' }),

  // The one topic this instance aggregates
  TOPIC: TB.String({ minLength: 1 }),

  SUBSCRIBE_ADDRESS: TB.String({ default: 'tcp://127.0.0.1:5566' }),
  METRICS_BIND_ADDRESS: TB.String({ default: 'tcp://*:5567' }),
}) satisfies SF.DefaultEnvSchema;

export type TopicAggregatorEnv = TB.Static<typeof topicAggregatorEnvSchema>;
