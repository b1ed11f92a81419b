import { SF } from '@doc-analytics/service-framework-node';
import { workDispatcherEnvSchema } from './environment.js';

export function createWorkDispatcherContext(
  processContext: SF.ProcessLifecycleContext,
  customEnv?: Record<string, string | undefined>,
) {
  const envContext = SF.createEnvContext(workDispatcherEnvSchema, { source: customEnv });

  const diagnosticContext = SF.createDiagnosticContextFromEnv(envContext);

  const metricsContext = SF.createMetricsContext({
    envContext,
    enableDefaultMetrics: true,
    metrics: SF.workDispatcherMetrics,
  });

  return {
    envContext,
    diagnosticContext,
    metricsContext,
    processContext,
  };
}

export type WorkDispatcherContext = ReturnType<typeof createWorkDispatcherContext>;

export type WorkDispatcherMetrics = SF.RegisteredMetrics<WorkDispatcherContext>;
