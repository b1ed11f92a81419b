import type {
  MetricConfigCounter,
  MetricConfigGauge,
  MetricConfigHistogram,
} from '../../metrics/types.js';

const distributionPassesTotal: MetricConfigCounter<'result'> = {
  type: 'counter',
  name: 'distribution_passes_total',
  help: 'Distribution passes by result (completed, no_workers_available)',
  labelNames: ['result'] as const,
};

const itemsDispatchedTotal: MetricConfigCounter<'outcome'> = {
  type: 'counter',
  name: 'items_dispatched_total',
  help: 'Work items handled per pass by outcome (processed, failed, unassigned)',
  labelNames: ['outcome'] as const,
};

const workerCallDuration: MetricConfigHistogram<'status'> = {
  type: 'histogram',
  name: 'worker_call_duration_seconds',
  help: 'Duration of process requests sent to workers',
  labelNames: ['status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 10, 30],
};

const topicsReportedTotal: MetricConfigCounter = {
  type: 'counter',
  name: 'topics_reported_total',
  help: 'Topics workers reported as discovered in successful replies',
};

const pendingItems: MetricConfigGauge = {
  type: 'gauge',
  name: 'pending_items',
  help: 'Work items currently registered for the next pass',
};

const registeredWorkers: MetricConfigGauge = {
  type: 'gauge',
  name: 'registered_workers',
  help: 'Workers currently in the roster',
};

export const workDispatcherMetrics = {
  distributionPassesTotal,
  itemsDispatchedTotal,
  workerCallDuration,
  topicsReportedTotal,
  pendingItems,
  registeredWorkers,
};
