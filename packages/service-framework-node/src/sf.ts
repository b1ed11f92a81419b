export * from './componentMetrics/componentMetrics.js';
export {
  createCorrelationIdGenerator,
  createDiagnosticContext,
  createDiagnosticContextFromEnv,
  createLogger,
  formatLogEntry,
} from './diagnostics/diagnostics.js';
export type {
  CorrelationIdGenerator,
  DiagnosticConfig,
  DiagnosticContext,
  LogEntry,
  LogFields,
  LogOutputFormat,
  LogSeverity,
  Logger,
} from './diagnostics/types.js';
export { createEnvContext, createEnvParser } from './environment/environment.js';
export { DefaultEnvSchemaType } from './environment/types.js';
export type {
  DefaultEnv,
  DefaultEnvContext,
  DefaultEnvSchema,
  EnvContext,
  EnvParserConfig,
} from './environment/types.js';
export { createHttpServer } from './httpServer/httpServer.js';
export type {
  HealthCheckResult,
  HttpErrorBody,
  HttpServerConfig,
  ServiceContext,
} from './httpServer/types.js';
export { createMetricsContext } from './metrics/metrics.js';
export type {
  MetricConfigCounter,
  MetricConfigGauge,
  MetricConfigHistogram,
  MetricConfigSummary,
  MetricsConfig,
  MetricsContext,
  RegisteredMetrics,
} from './metrics/types.js';
export { startProcessLifecycle } from './processLifecycle/processLifecycle.js';
export type {
  ProcessLifecycleConfig,
  ProcessLifecycleContext,
  ShutdownCallback,
  ShutdownConfiguration,
} from './processLifecycle/types.js';
