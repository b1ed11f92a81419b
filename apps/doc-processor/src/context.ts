import { SF } from '@doc-analytics/service-framework-node';
import { docProcessorEnvSchema } from './environment.js';

export function createDocProcessorContext(
  processContext: SF.ProcessLifecycleContext,
  customEnv?: Record<string, string | undefined>,
) {
  const envContext = SF.createEnvContext(docProcessorEnvSchema, { source: customEnv });

  const diagnosticContext = SF.createDiagnosticContextFromEnv(envContext);

  const metricsContext = SF.createMetricsContext({
    envContext,
    enableDefaultMetrics: true,
    metrics: SF.docProcessorMetrics,
  });

  return {
    envContext,
    diagnosticContext,
    metricsContext,
    processContext,
  };
}

export type DocProcessorContext = ReturnType<typeof createDocProcessorContext>;

export type DocProcessorMetrics = SF.RegisteredMetrics<DocProcessorContext>;
