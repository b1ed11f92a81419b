import { describe, expect, it, vi } from 'vitest';
import type { ProcessResponse } from '@doc-analytics/interface';
import { ZmqRequestError } from '@doc-analytics/messaging-node';
import { createInMemoryRequester } from '@doc-analytics/messaging-node/test';
import {
  createMockDiagnosticsContext,
  createMockMetricsContext,
} from '@doc-analytics/service-framework-node/test';
import type { WorkDispatcherMetrics } from '../context.js';
import { createDispatcher } from './dispatcher.js';
import { NoWorkersAvailableError } from './errors.js';
import { createRoundRobinSelectionPolicy } from './selectionPolicy.js';
import type { SelectionPolicy, Worker } from './types.js';
import { createZmqWorkerClient } from './zmqWorkerClient.js';

function success(item: string, topics: string[] = ['Intro']): ProcessResponse {
  return { status: 'success', topics, topicsFound: topics.length, item };
}

function setup(
  handle: (worker: Worker, item: string) => Promise<ProcessResponse>,
  selectionPolicy: SelectionPolicy = createRoundRobinSelectionPolicy(),
) {
  const metricsContext = createMockMetricsContext<WorkDispatcherMetrics>();
  const processItem = vi.fn(handle);
  const dispatcher = createDispatcher({
    diagnosticContext: createMockDiagnosticsContext(),
    metrics: metricsContext.metrics,
    selectionPolicy,
    workerClient: { process: processItem },
  });
  return { dispatcher, processItem, metricsContext };
}

const workerA: Worker = { id: 'worker-a', endpoint: 'tcp://10.0.0.1:5565' };
const workerB: Worker = { id: 'worker-b', endpoint: 'tcp://10.0.0.2:5565' };

describe('createDispatcher', () => {
  describe('registration', () => {
    it('should replace pending items wholesale', () => {
      const { dispatcher } = setup(async (_worker, item) => success(item));

      dispatcher.registerItems(['a.md', 'b.md']);
      const registered = dispatcher.registerItems(['c.md']);

      expect(registered).toBe(1);
      expect(dispatcher.getPendingItems()).toEqual(['c.md']);
    });

    it('should keep duplicate workers as separate entries', () => {
      const { dispatcher } = setup(async (_worker, item) => success(item));

      dispatcher.registerWorker(workerA);
      dispatcher.registerWorker(workerA);
      dispatcher.registerWorker(workerB);

      expect(dispatcher.getWorkers()).toEqual([workerA, workerA, workerB]);
      expect(dispatcher.unregisterWorker('worker-a')).toBe(2);
      expect(dispatcher.getWorkers()).toEqual([workerB]);
      expect(dispatcher.unregisterWorker('worker-a')).toBe(0);
    });

    it('should select nothing from an empty roster', () => {
      const { dispatcher } = setup(async (_worker, item) => success(item));

      expect(dispatcher.selectWorker()).toBeUndefined();
    });
  });

  describe('distribute', () => {
    it('should return zeros without contacting workers when nothing is pending', async () => {
      const { dispatcher, processItem } = setup(async (_worker, item) => success(item));

      expect(await dispatcher.distribute()).toEqual({
        status: 'completed',
        outcome: { processedCount: 0, errorCount: 0 },
      });

      dispatcher.registerWorker(workerA);
      dispatcher.registerWorker(workerB);

      expect(await dispatcher.distribute()).toEqual({
        status: 'completed',
        outcome: { processedCount: 0, errorCount: 0 },
      });
      expect(processItem).not.toHaveBeenCalled();
    });

    it('should report no workers available without contacting anyone', async () => {
      const { dispatcher, processItem } = setup(async (_worker, item) => success(item));
      dispatcher.registerItems(['a.md']);

      const result = await dispatcher.distribute();

      expect(result.status).toBe('no_workers_available');
      if (result.status === 'no_workers_available') {
        expect(result.error).toBeInstanceOf(NoWorkersAvailableError);
        expect(result.error.message).toBe('No workers available');
      }
      expect(processItem).not.toHaveBeenCalled();
    });

    it('should send every item exactly once, in registration order', async () => {
      const { dispatcher, processItem } = setup(async (_worker, item) => success(item));
      dispatcher.registerWorker(workerA);
      dispatcher.registerWorker(workerB);
      dispatcher.registerItems(['a.md', 'b.md', 'c.md', 'd.md', 'e.md']);

      const result = await dispatcher.distribute();

      expect(result).toEqual({
        status: 'completed',
        outcome: { processedCount: 5, errorCount: 0 },
      });
      expect(processItem.mock.calls.map(([, item]) => item)).toEqual([
        'a.md',
        'b.md',
        'c.md',
        'd.md',
        'e.md',
      ]);
      expect(processItem.mock.calls.map(([worker]) => worker.id)).toEqual([
        'worker-a',
        'worker-b',
        'worker-a',
        'worker-b',
        'worker-a',
      ]);
    });

    it('should count both items when one worker succeeds twice', async () => {
      const { dispatcher } = setup(async (_worker, item) => success(item));
      dispatcher.registerWorker(workerA);
      dispatcher.registerItems(['a.md', 'b.md']);

      expect(await dispatcher.distribute()).toEqual({
        status: 'completed',
        outcome: { processedCount: 2, errorCount: 0 },
      });
    });

    it('should count an error reply without retrying the item', async () => {
      const { dispatcher, processItem } = setup(async (_worker, item) =>
        item === 'b.md' ? { status: 'error', message: 'File not found: b.md' } : success(item),
      );
      dispatcher.registerWorker(workerA);
      dispatcher.registerItems(['a.md', 'b.md']);

      expect(await dispatcher.distribute()).toEqual({
        status: 'completed',
        outcome: { processedCount: 1, errorCount: 1 },
      });
      expect(processItem).toHaveBeenCalledTimes(2);
    });

    it('should count timeouts and transport failures and keep going', async () => {
      const { dispatcher, processItem } = setup(async (worker, item) => {
        if (item === 'a.md') {
          throw new ZmqRequestError('No reply', worker.endpoint, 'timeout');
        }
        if (item === 'b.md') {
          throw new Error('connection refused');
        }
        return success(item);
      });
      dispatcher.registerWorker(workerA);
      dispatcher.registerItems(['a.md', 'b.md', 'c.md']);

      expect(await dispatcher.distribute()).toEqual({
        status: 'completed',
        outcome: { processedCount: 1, errorCount: 2 },
      });
      expect(processItem).toHaveBeenCalledTimes(3);
    });

    it('should count the rest of the pass as errors when the roster empties', async () => {
      const context: { unregister?: () => void } = {};
      const { dispatcher, processItem } = setup(async (_worker, item) => {
        context.unregister?.();
        return success(item);
      });
      context.unregister = () => dispatcher.unregisterWorker('worker-a');
      dispatcher.registerWorker(workerA);
      dispatcher.registerItems(['a.md', 'b.md', 'c.md']);

      expect(await dispatcher.distribute()).toEqual({
        status: 'completed',
        outcome: { processedCount: 1, errorCount: 2 },
      });
      expect(processItem).toHaveBeenCalledTimes(1);
    });

    it('should keep distributing from a snapshot when items are re-registered mid-pass', async () => {
      const context: { register?: () => void } = {};
      const { dispatcher, processItem } = setup(async (_worker, item) => {
        context.register?.();
        return success(item);
      });
      context.register = () => dispatcher.registerItems(['z.md']);
      dispatcher.registerWorker(workerA);
      dispatcher.registerItems(['a.md', 'b.md']);

      await dispatcher.distribute();

      expect(processItem.mock.calls.map(([, item]) => item)).toEqual(['a.md', 'b.md']);
      expect(dispatcher.getPendingItems()).toEqual(['z.md']);
    });

    it('should run concurrent passes one after another', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const { dispatcher, processItem } = setup(async (_worker, item) => {
        await gate;
        return success(item);
      });
      dispatcher.registerWorker(workerA);
      dispatcher.registerItems(['a.md', 'b.md']);

      const first = dispatcher.distribute();
      const second = dispatcher.distribute();

      await vi.waitFor(() => expect(processItem).toHaveBeenCalledTimes(1));
      release();

      const results = await Promise.all([first, second]);

      expect(results.map((result) => result.status === 'completed' && result.outcome)).toEqual([
        { processedCount: 2, errorCount: 0 },
        { processedCount: 2, errorCount: 0 },
      ]);
      expect(processItem.mock.calls.map(([, item]) => item)).toEqual([
        'a.md',
        'b.md',
        'a.md',
        'b.md',
      ]);
    });

    it('should record per-item outcomes in metrics', async () => {
      const { dispatcher, metricsContext } = setup(async (_worker, item) =>
        item === 'a.md' ? success(item, ['A', 'B']) : { status: 'error', message: 'boom' },
      );
      dispatcher.registerWorker(workerA);
      dispatcher.registerItems(['a.md', 'b.md']);

      await dispatcher.distribute();

      const items = metricsContext.mockMetric('itemsDispatchedTotal');
      expect(items.inc).toHaveBeenCalledWith({ outcome: 'processed' });
      expect(items.inc).toHaveBeenCalledWith({ outcome: 'failed' });
      expect(metricsContext.mockMetric('topicsReportedTotal').inc).toHaveBeenCalledWith(2);
      expect(metricsContext.mockMetric('distributionPassesTotal').inc).toHaveBeenCalledWith({
        result: 'completed',
      });
    });
  });

  describe('over the request client', () => {
    it('should count replies carrying only status and topics as processed', async () => {
      const requester = createInMemoryRequester({
        'tcp://10.0.0.9:5565': async () => ({ status: 'success', topics: ['Intro'] }),
      });
      const dispatcher = createDispatcher({
        diagnosticContext: createMockDiagnosticsContext(),
        metrics: createMockMetricsContext<WorkDispatcherMetrics>().metrics,
        selectionPolicy: createRoundRobinSelectionPolicy(),
        workerClient: createZmqWorkerClient(requester),
      });

      dispatcher.registerWorker({ id: 'worker-z', endpoint: 'tcp://10.0.0.9:5565' });
      dispatcher.registerItems(['a.md', 'b.md']);

      expect(await dispatcher.distribute()).toEqual({
        status: 'completed',
        outcome: { processedCount: 2, errorCount: 0 },
      });
      expect(requester.calls).toHaveLength(2);
    });
  });
});
