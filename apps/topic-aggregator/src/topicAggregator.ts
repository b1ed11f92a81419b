#!/usr/bin/env node
import { SF } from '@doc-analytics/service-framework-node';
import { createTopicAggregatorContext } from './context.js';
import { startTopicAggregatorService } from './topicAggregatorService.js';

async function bootstrap(): Promise<void> {
  await SF.startProcessLifecycle(async (processContext) => {
    const context = createTopicAggregatorContext(processContext);

    await startTopicAggregatorService(context);

    return {
      diagnosticContext: context.diagnosticContext,
      envContext: context.envContext,
    };
  });
}

void bootstrap();
