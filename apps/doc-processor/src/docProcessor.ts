#!/usr/bin/env node
import { SF } from '@doc-analytics/service-framework-node';
import { createDocProcessorContext } from './context.js';
import { startDocProcessorService } from './docProcessorService.js';

async function bootstrap(): Promise<void> {
  await SF.startProcessLifecycle(async (processContext) => {
    const context = createDocProcessorContext(processContext);

    await startDocProcessorService(context);

    return {
      diagnosticContext: context.diagnosticContext,
      envContext: context.envContext,
    };
  });
}

void bootstrap();
