import { analyzeContent } from '@doc-analytics/content-analyzer';
import type { TopicMetrics } from '@doc-analytics/interface';
import type { TopicSubscriber } from '@doc-analytics/messaging-node';
import type { SF } from '@doc-analytics/service-framework-node';
import { previewText } from '@doc-analytics/utils';
import type { TopicAggregatorMetrics } from '../context.js';

interface TopicAggregatorOptions {
  topic: string;
  diagnosticContext: SF.DiagnosticContext;
  metrics: TopicAggregatorMetrics;
}

/**
 * Running line, word, char and document totals for a single topic. Totals
 * only grow; there is no reset.
 */
export function createTopicAggregator(options: TopicAggregatorOptions) {
  const { topic, diagnosticContext, metrics } = options;
  const logger = diagnosticContext.logger;

  const totals: TopicMetrics = {
    topic,
    lineCount: 0,
    wordCount: 0,
    charCount: 0,
    docCount: 0,
  };

  function publishGauges(): void {
    metrics.aggregatedCount.set({ kind: 'lines' }, totals.lineCount);
    metrics.aggregatedCount.set({ kind: 'words' }, totals.wordCount);
    metrics.aggregatedCount.set({ kind: 'chars' }, totals.charCount);
    metrics.aggregatedCount.set({ kind: 'docs' }, totals.docCount);
  }

  function processContent(content: string): void {
    const analysis = analyzeContent(content);

    totals.lineCount += analysis.lineCount;
    totals.wordCount += analysis.wordCount;
    totals.charCount += analysis.charCount;
    totals.docCount += 1;

    metrics.contentChunksTotal.inc();
    publishGauges();

    logger.debug('Folded content', {
      preview: previewText(content),
      ...analysis,
      docCount: totals.docCount,
    });
  }

  function getMetrics(): TopicMetrics {
    return { ...totals };
  }

  /** Folds every message the subscriber yields until it is closed. */
  async function consume(subscriber: TopicSubscriber): Promise<void> {
    logger.info('Consuming broadcasts');
    for await (const content of subscriber.receive()) {
      processContent(content);
    }
    logger.info('Subscription ended', { ...getMetrics() });
  }

  return {
    topic,
    processContent,
    getMetrics,
    consume,
  };
}

export type TopicAggregator = ReturnType<typeof createTopicAggregator>;
