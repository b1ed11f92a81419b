import type { SF } from '@doc-analytics/service-framework-node';
import { TB } from '@doc-analytics/service-framework-node/typebox';

export const docProcessorEnvSchema = TB.Object({
  PROCESS_NAME: TB.String({ default: 'doc-processor' }),
  NODE_ENV: TB.String({ default: 'development' }),
  PORT: TB.Integer({ default: 3001 }),
  LOG_LEVEL: TB.String({ default: 'info' }),
  LOG_FORMAT: TB.String({ default: 'human' }),

  // ZeroMQ sockets
  PROCESS_BIND_ADDRESS: TB.String({ default: 'tcp://*:5565' }),
  PUBLISH_BIND_ADDRESS: TB.String({ default: 'tcp://*:5566' }),

  // Where documents are looked up by file name when the given path does not exist
  DOCUMENTS_FALLBACK_DIR: TB.String({ default: '/documents' }),
}) satisfies SF.DefaultEnvSchema;

export type DocProcessorEnv = TB.Static<typeof docProcessorEnvSchema>;
