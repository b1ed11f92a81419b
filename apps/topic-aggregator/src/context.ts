import { SF } from '@doc-analytics/service-framework-node';
import { topicAggregatorEnvSchema } from './environment.js';

export function createTopicAggregatorContext(
  processContext: SF.ProcessLifecycleContext,
  customEnv?: Record<string, string | undefined>,
) {
  const envContext = SF.createEnvContext(topicAggregatorEnvSchema, { source: customEnv });

  const diagnosticContext = SF.createDiagnosticContextFromEnv(envContext).getChildDiagnosticContext({
    topic: envContext.config.TOPIC,
  });

  const metricsContext = SF.createMetricsContext({
    envContext,
    enableDefaultMetrics: true,
    metrics: SF.topicAggregatorMetrics,
  });

  return {
    envContext,
    diagnosticContext,
    metricsContext,
    processContext,
  };
}

export type TopicAggregatorContext = ReturnType<typeof createTopicAggregatorContext>;

export type TopicAggregatorMetrics = SF.RegisteredMetrics<TopicAggregatorContext>;
