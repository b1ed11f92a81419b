import { describe, expect, it, vi } from 'vitest';
import { createInMemoryBroadcastBus } from '@doc-analytics/messaging-node/test';
import {
  createMockDiagnosticsContext,
  createMockMetricsContext,
} from '@doc-analytics/service-framework-node/test';
import type { TopicAggregatorMetrics } from '../context.js';
import { createTopicAggregator } from './aggregator.js';

const sample = 'Line 1\nLine 2\nLine 3 with more words';

function setup(topic = 'Intro') {
  const metricsContext = createMockMetricsContext<TopicAggregatorMetrics>();
  const aggregator = createTopicAggregator({
    topic,
    diagnosticContext: createMockDiagnosticsContext(),
    metrics: metricsContext.metrics,
  });
  return { aggregator, metricsContext };
}

describe('createTopicAggregator', () => {
  it('should start from zero totals', () => {
    const { aggregator } = setup();

    expect(aggregator.getMetrics()).toEqual({
      topic: 'Intro',
      lineCount: 0,
      wordCount: 0,
      charCount: 0,
      docCount: 0,
    });
  });

  it('should count an empty chunk as a document only', () => {
    const { aggregator } = setup();

    aggregator.processContent('');

    expect(aggregator.getMetrics()).toEqual({
      topic: 'Intro',
      lineCount: 0,
      wordCount: 0,
      charCount: 0,
      docCount: 1,
    });
  });

  it('should add line, word and char counts of each chunk', () => {
    const { aggregator } = setup();

    aggregator.processContent(sample);
    expect(aggregator.getMetrics()).toEqual({
      topic: 'Intro',
      lineCount: 3,
      wordCount: 9,
      charCount: 34,
      docCount: 1,
    });

    aggregator.processContent(sample);
    expect(aggregator.getMetrics()).toEqual({
      topic: 'Intro',
      lineCount: 6,
      wordCount: 18,
      charCount: 68,
      docCount: 2,
    });
  });

  it('should return a snapshot that later updates do not touch', () => {
    const { aggregator } = setup();
    aggregator.processContent(sample);

    const first = aggregator.getMetrics();
    expect(aggregator.getMetrics()).toEqual(first);

    aggregator.processContent(sample);
    expect(first.docCount).toBe(1);
  });

  it('should mirror the totals into gauges', () => {
    const { aggregator, metricsContext } = setup();

    aggregator.processContent(sample);

    const gauge = metricsContext.mockMetric('aggregatedCount');
    expect(gauge.set).toHaveBeenCalledWith({ kind: 'lines' }, 3);
    expect(gauge.set).toHaveBeenCalledWith({ kind: 'words' }, 9);
    expect(gauge.set).toHaveBeenCalledWith({ kind: 'chars' }, 34);
    expect(gauge.set).toHaveBeenCalledWith({ kind: 'docs' }, 1);
    expect(metricsContext.mockMetric('contentChunksTotal').inc).toHaveBeenCalledTimes(1);
  });

  it('should fold broadcasts of its own topic only', async () => {
    const bus = createInMemoryBroadcastBus();
    const { aggregator } = setup('Usage');
    const subscriber = bus.subscribe('Usage');
    subscriber.connect();

    const consuming = aggregator.consume(subscriber);

    await bus.publisher.publish('Usage', '# Usage\nRun it.');
    await bus.publisher.publish('Usage extra', 'ignored body');
    await bus.publisher.publish('Intro', 'other topic');

    await vi.waitFor(() => expect(aggregator.getMetrics().docCount).toBe(1));

    subscriber.close();
    await consuming;

    expect(aggregator.getMetrics()).toEqual({
      topic: 'Usage',
      lineCount: 2,
      wordCount: 4,
      charCount: 14,
      docCount: 1,
    });
  });
});
