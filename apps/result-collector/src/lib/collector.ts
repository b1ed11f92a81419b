import {
  GET_METRICS_ACTION,
  metricsResponseSchema,
  type MetricsRequest,
  type TopicMetrics,
} from '@doc-analytics/interface';
import type { Requester } from '@doc-analytics/messaging-node';
import type { SF } from '@doc-analytics/service-framework-node';
import { AggregatorQueryError } from './errors.js';

export interface AggregatorTarget {
  topic: string;
  endpoint: string;
}

function addMetrics(current: TopicMetrics | undefined, next: TopicMetrics): TopicMetrics {
  if (!current) {
    return { ...next };
  }
  return {
    topic: current.topic,
    lineCount: current.lineCount + next.lineCount,
    wordCount: current.wordCount + next.wordCount,
    charCount: current.charCount + next.charCount,
    docCount: current.docCount + next.docCount,
  };
}

/**
 * Asks every aggregator for its snapshot, one after another, and merges the
 * replies by the topic each aggregator reports. Aggregators that fail or
 * answer with an error are logged and left out.
 */
export async function collectResults(
  aggregators: AggregatorTarget[],
  requester: Requester,
  logger: SF.Logger,
): Promise<Record<string, TopicMetrics>> {
  // topic names are heading text and may collide with Object.prototype keys
  const results = new Map<string, TopicMetrics>();
  const request: MetricsRequest = { action: GET_METRICS_ACTION };

  for (const { topic, endpoint } of aggregators) {
    try {
      const reply = await requester.request(endpoint, request, metricsResponseSchema);

      if (reply.status === 'error') {
        logger.error(
          new AggregatorQueryError(reply.message, topic, endpoint),
          'Aggregator replied with an error',
        );
        continue;
      }

      const { metrics } = reply;
      results.set(metrics.topic, addMetrics(results.get(metrics.topic), metrics));
    } catch (error) {
      logger.error(error, 'Failed to collect metrics', { topic, endpoint });
    }
  }

  return Object.fromEntries(results);
}
