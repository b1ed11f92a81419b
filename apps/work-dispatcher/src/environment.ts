import type { SF } from '@doc-analytics/service-framework-node';
import { TB } from '@doc-analytics/service-framework-node/typebox';

export const workDispatcherEnvSchema = TB.Object({
  PROCESS_NAME: TB.String({ default: 'work-dispatcher' }),
  NODE_ENV: TB.String({ default: 'development' }),
  PORT: TB.Integer({ default: 5555 }),
  LOG_LEVEL: TB.String({ default: 'info' }),
  LOG_FORMAT: TB.String({ default: 'human' }),

  // Upper bound for one process request to a worker
  WORKER_CALL_TIMEOUT_MS: TB.Integer({ default: 30000, minimum: 1 }),
  WORKER_SELECTION_POLICY: TB.Union([TB.Literal('random'), TB.Literal('round-robin')], {
    default: 'random',
  }),
}) satisfies SF.DefaultEnvSchema;

export type WorkDispatcherEnv = TB.Static<typeof workDispatcherEnvSchema>;
