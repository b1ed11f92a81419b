import type { MetricConfigCounter, MetricConfigHistogram } from '../../metrics/types.js';

const documentsProcessedTotal: MetricConfigCounter<'status'> = {
  type: 'counter',
  name: 'documents_processed_total',
  help: 'Process requests handled, by reply status',
  labelNames: ['status'] as const,
};

const topicsPublishedTotal: MetricConfigCounter = {
  type: 'counter',
  name: 'topics_published_total',
  help: 'Topic broadcasts sent',
};

const documentProcessingDuration: MetricConfigHistogram = {
  type: 'histogram',
  name: 'document_processing_duration_seconds',
  help: 'Time from receiving a process request to replying',
  buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1, 5],
};

export const docProcessorMetrics = {
  documentsProcessedTotal,
  topicsPublishedTotal,
  documentProcessingDuration,
};
