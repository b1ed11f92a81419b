import {
  GET_METRICS_ACTION,
  metricsRequestSchema,
  type MetricsResponse,
} from '@doc-analytics/interface';
import type { RequestHandler } from '@doc-analytics/messaging-node';
import type { TopicAggregator } from './aggregator.js';

export function createMetricsRequestHandler(
  aggregator: Pick<TopicAggregator, 'getMetrics'>,
): RequestHandler {
  return async (request: unknown): Promise<MetricsResponse> => {
    const parsed = metricsRequestSchema.safeParse(request);

    if (!parsed.success || parsed.data.action !== GET_METRICS_ACTION) {
      return { status: 'error', message: 'Invalid action' };
    }

    return { status: 'success', metrics: aggregator.getMetrics() };
  };
}
