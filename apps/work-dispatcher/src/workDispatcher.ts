#!/usr/bin/env node
import { SF } from '@doc-analytics/service-framework-node';
import { createWorkDispatcherContext } from './context.js';
import { startWorkDispatcherService } from './workDispatcherService.js';

async function bootstrap(): Promise<void> {
  await SF.startProcessLifecycle(async (processContext) => {
    const context = createWorkDispatcherContext(processContext);

    await startWorkDispatcherService(context);

    return {
      diagnosticContext: context.diagnosticContext,
      envContext: context.envContext,
    };
  });
}

void bootstrap();
