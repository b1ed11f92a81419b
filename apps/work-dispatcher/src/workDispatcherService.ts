import { createZmqRequester } from '@doc-analytics/messaging-node';
import { SF } from '@doc-analytics/service-framework-node';
import type { WorkDispatcherContext } from './context.js';
import { registerControlRoutes } from './lib/controlRoutes.js';
import { createDispatcher } from './lib/dispatcher.js';
import { createSelectionPolicy } from './lib/selectionPolicy.js';
import { createZmqWorkerClient } from './lib/zmqWorkerClient.js';

export function createWorkDispatcherServer(context: WorkDispatcherContext) {
  const { diagnosticContext, envContext, metricsContext } = context;

  const requester = createZmqRequester({
    diagnosticContext,
    timeoutMs: envContext.config.WORKER_CALL_TIMEOUT_MS,
  });

  const dispatcher = createDispatcher({
    diagnosticContext,
    metrics: metricsContext.metrics,
    selectionPolicy: createSelectionPolicy(envContext.config.WORKER_SELECTION_POLICY),
    workerClient: createZmqWorkerClient(requester),
  });

  const httpServer = SF.createHttpServer(context, {
    healthChecks: [
      async () => ({
        component: 'Dispatcher',
        isHealthy: true,
      }),
    ],
  });

  registerControlRoutes(httpServer, dispatcher);

  return { httpServer, dispatcher };
}

export async function startWorkDispatcherService(context: WorkDispatcherContext): Promise<void> {
  const { diagnosticContext, processContext } = context;
  const logger = diagnosticContext.logger;

  const { httpServer } = createWorkDispatcherServer(context);

  processContext.onShutdown(async () => {
    logger.info('Shutting down work dispatcher');
  });

  await httpServer.startServer();
  logger.info('Work dispatcher started', {
    callTimeoutMs: context.envContext.config.WORKER_CALL_TIMEOUT_MS,
    selectionPolicy: context.envContext.config.WORKER_SELECTION_POLICY,
  });
}
