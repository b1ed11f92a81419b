import { Counter, Gauge, Histogram, Registry, Summary, collectDefaultMetrics } from 'prom-client';
import type {
  MetricConfig,
  MetricConfigCounter,
  MetricConfigGauge,
  MetricConfigHistogram,
  MetricConfigSummary,
  MetricsConfig,
  MetricsContext,
  MetricsFromConfigs,
} from './types.js';

const defaultHistogramBuckets = [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 10, 30];
const defaultSummaryPercentiles = [0.5, 0.95, 0.99];
const defaultSummaryMaxAgeSeconds = 600;
const defaultSummaryAgeBuckets = 5;

const metricNamePattern = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const labelNamePattern = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function normalizeServiceName(serviceName: string): string {
  return serviceName
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
}

function validateMetricConfig(config: MetricConfig): void {
  if (!metricNamePattern.test(config.name)) {
    throw new Error(
      `Invalid metric name '${config.name}'. Metric names must match pattern: ${metricNamePattern.source}`,
    );
  }

  for (const label of config.labelNames ?? []) {
    if (!labelNamePattern.test(label)) {
      throw new Error(
        `Invalid label name '${label}'. Label names must match pattern: ${labelNamePattern.source}`,
      );
    }
    if (label.startsWith('__')) {
      throw new Error(`Label name '${label}' is reserved. Label names cannot start with '__'`);
    }
  }
}

export function createMetricsContext<TConfigs extends Record<string, MetricConfig>>(
  config: MetricsConfig<TConfigs>,
): MetricsContext<MetricsFromConfigs<TConfigs>> {
  const registry = new Registry();
  const prefix = `${normalizeServiceName(config.envContext.config.PROCESS_NAME)}_${config.prefix ?? ''}`;

  if (config.enableDefaultMetrics) {
    collectDefaultMetrics({ register: registry });
  }

  function createCounter<T extends string>(metric: MetricConfigCounter<T>): Counter<T> {
    validateMetricConfig(metric);
    return new Counter<T>({
      name: `${prefix}${metric.name}`,
      help: metric.help,
      labelNames: metric.labelNames ?? [],
      registers: [registry],
    });
  }

  function createGauge<T extends string>(metric: MetricConfigGauge<T>): Gauge<T> {
    validateMetricConfig(metric);
    return new Gauge<T>({
      name: `${prefix}${metric.name}`,
      help: metric.help,
      labelNames: metric.labelNames ?? [],
      registers: [registry],
    });
  }

  function createHistogram<T extends string>(metric: MetricConfigHistogram<T>): Histogram<T> {
    validateMetricConfig(metric);
    return new Histogram<T>({
      name: `${prefix}${metric.name}`,
      help: metric.help,
      labelNames: metric.labelNames ?? [],
      buckets: metric.buckets ?? defaultHistogramBuckets,
      registers: [registry],
    });
  }

  function createSummary<T extends string>(metric: MetricConfigSummary<T>): Summary<T> {
    validateMetricConfig(metric);
    return new Summary<T>({
      name: `${prefix}${metric.name}`,
      help: metric.help,
      labelNames: metric.labelNames ?? [],
      percentiles: metric.percentiles ?? defaultSummaryPercentiles,
      maxAgeSeconds: metric.maxAgeSeconds ?? defaultSummaryMaxAgeSeconds,
      ageBuckets: metric.ageBuckets ?? defaultSummaryAgeBuckets,
      registers: [registry],
    });
  }

  function createMetricFromConfig(metric: MetricConfig) {
    switch (metric.type) {
      case 'counter':
        return createCounter(metric);
      case 'gauge':
        return createGauge(metric);
      case 'histogram':
        return createHistogram(metric);
      case 'summary':
        return createSummary(metric);
    }
  }

  const instantiated = Object.fromEntries(
    Object.entries(config.metrics).map(([key, metric]) => [key, createMetricFromConfig(metric)]),
  );

  return {
    getRegistry: () => registry,
    createCounter,
    createGauge,
    createHistogram,
    createSummary,
    getMetricsAsString: () => registry.metrics(),
    clearMetrics: () => registry.clear(),
    // keys and metric kinds mirror config.metrics one to one
    metrics: instantiated as unknown as MetricsFromConfigs<TConfigs>,
  };
}
