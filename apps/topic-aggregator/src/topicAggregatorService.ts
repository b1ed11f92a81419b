import { createZmqReplier, createZmqTopicSubscriber } from '@doc-analytics/messaging-node';
import { SF } from '@doc-analytics/service-framework-node';
import type { TopicAggregatorContext } from './context.js';
import { createTopicAggregator } from './lib/aggregator.js';
import { createMetricsRequestHandler } from './lib/metricsRequestHandler.js';

export async function startTopicAggregatorService(context: TopicAggregatorContext): Promise<void> {
  const { diagnosticContext, envContext, metricsContext, processContext } = context;
  const { config } = envContext;
  const logger = diagnosticContext.logger;

  const aggregator = createTopicAggregator({
    topic: config.TOPIC,
    diagnosticContext,
    metrics: metricsContext.metrics,
  });

  const subscriber = createZmqTopicSubscriber({
    diagnosticContext,
    address: config.SUBSCRIBE_ADDRESS,
    topic: config.TOPIC,
  });

  const replier = createZmqReplier({
    diagnosticContext,
    endpoint: config.METRICS_BIND_ADDRESS,
    handler: createMetricsRequestHandler(aggregator),
  });

  let subscriptionActive = false;

  const httpServer = SF.createHttpServer(context, {
    healthChecks: [
      async () => ({ component: 'Subscription', isHealthy: subscriptionActive }),
      async () => ({ component: 'Metrics socket', isHealthy: replier.isRunning() }),
    ],
  });

  processContext.onShutdown(async () => {
    logger.info('Shutting down topic aggregator', { ...aggregator.getMetrics() });
    subscriber.close();
    await replier.stop();
  });

  subscriber.connect();
  subscriptionActive = true;
  aggregator
    .consume(subscriber)
    .catch((error: unknown) => {
      if (!processContext.isShuttingDown()) {
        logger.error(error, 'Subscription loop failed');
      }
    })
    .finally(() => {
      subscriptionActive = false;
    });

  await replier.start();
  await httpServer.startServer();

  logger.info('Topic aggregator started', {
    subscribeAddress: config.SUBSCRIBE_ADDRESS,
    metricsAddress: config.METRICS_BIND_ADDRESS,
  });
}
