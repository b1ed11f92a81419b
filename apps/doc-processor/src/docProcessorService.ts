import { createZmqReplier, createZmqTopicPublisher } from '@doc-analytics/messaging-node';
import { SF } from '@doc-analytics/service-framework-node';
import type { DocProcessorContext } from './context.js';
import { createDocumentProcessor } from './lib/documentProcessor.js';
import { createPathResolver } from './lib/pathResolver.js';

export async function startDocProcessorService(context: DocProcessorContext): Promise<void> {
  const { diagnosticContext, envContext, metricsContext, processContext } = context;
  const { config } = envContext;
  const logger = diagnosticContext.logger;

  const publisher = await createZmqTopicPublisher({
    diagnosticContext,
    address: config.PUBLISH_BIND_ADDRESS,
  });

  const documentProcessor = createDocumentProcessor({
    diagnosticContext,
    metrics: metricsContext.metrics,
    pathResolver: createPathResolver({ fallbackDir: config.DOCUMENTS_FALLBACK_DIR }),
    publisher,
  });

  const replier = createZmqReplier({
    diagnosticContext,
    endpoint: config.PROCESS_BIND_ADDRESS,
    handler: documentProcessor.handleRequest,
  });

  const httpServer = SF.createHttpServer(context, {
    healthChecks: [
      async () => ({
        component: 'Process socket',
        isHealthy: replier.isRunning(),
      }),
    ],
  });

  processContext.onShutdown(async () => {
    logger.info('Shutting down document processor');
    await replier.stop();
    await publisher.close();
  });

  await replier.start();
  await httpServer.startServer();

  logger.info('Document processor started', {
    processAddress: config.PROCESS_BIND_ADDRESS,
    publishAddress: config.PUBLISH_BIND_ADDRESS,
    fallbackDir: config.DOCUMENTS_FALLBACK_DIR,
  });
}
