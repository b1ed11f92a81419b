import type { SF } from '@doc-analytics/service-framework-node';
import { TB } from '@doc-analytics/service-framework-node/typebox';

export const resultCollectorEnvSchema = TB.Object({
  PROCESS_NAME: TB.String({ default: 'result-collector' }),
  NODE_ENV: TB.String({ default: 'development' }),
  // stdout carries the JSON result, so only errors are logged by default
  LOG_LEVEL: TB.String({ default: 'error' }),
  LOG_FORMAT: TB.String({ default: 'human' }),

  REQUEST_TIMEOUT_MS: TB.Integer({ default: 5000, minimum: 1 }),
}) satisfies SF.DefaultEnvSchema;

export type ResultCollectorEnv = TB.Static<typeof resultCollectorEnvSchema>;
