import { ZmqRequestError } from '@doc-analytics/messaging-node';
import type { SF } from '@doc-analytics/service-framework-node';
import type { WorkDispatcherMetrics } from '../context.js';
import { NoWorkersAvailableError, WorkerCallFailedError } from './errors.js';
import type {
  DistributionOutcome,
  DistributionResult,
  SelectionPolicy,
  WorkItem,
  Worker,
  WorkerClient,
} from './types.js';
import { createWorkerRoster } from './workerRoster.js';

interface DispatcherOptions {
  diagnosticContext: SF.DiagnosticContext;
  metrics: WorkDispatcherMetrics;
  selectionPolicy: SelectionPolicy;
  workerClient: WorkerClient;
}

type ItemOutcome =
  | { processed: true; topics: string[] }
  | { processed: false; error: WorkerCallFailedError };

function describeFailure(error: unknown, item: WorkItem, worker: Worker): WorkerCallFailedError {
  if (error instanceof ZmqRequestError) {
    return new WorkerCallFailedError(error.message, item, worker.id, error.reason);
  }
  return new WorkerCallFailedError(
    error instanceof Error ? error.message : String(error),
    item,
    worker.id,
    'transport',
  );
}

export function createDispatcher(options: DispatcherOptions) {
  const { diagnosticContext, metrics, selectionPolicy, workerClient } = options;
  const logger = diagnosticContext.logger;

  const roster = createWorkerRoster();
  let pendingItems: WorkItem[] = [];
  let passCount = 0;
  let currentPass: Promise<void> = Promise.resolve();

  function registerItems(items: readonly WorkItem[]): number {
    pendingItems = [...items];
    metrics.pendingItems.set(pendingItems.length);

    logger.info('Registered work items', { count: pendingItems.length });
    return pendingItems.length;
  }

  function registerWorker(worker: Worker): void {
    roster.add(worker);
    metrics.registeredWorkers.set(roster.size());

    logger.info('Registered worker', {
      workerId: worker.id,
      endpoint: worker.endpoint,
      rosterSize: roster.size(),
    });
  }

  function unregisterWorker(id: string): number {
    const removed = roster.removeById(id);
    metrics.registeredWorkers.set(roster.size());

    logger.info('Unregistered worker', { workerId: id, removed, rosterSize: roster.size() });
    return removed;
  }

  function selectWorker(): Worker | undefined {
    return selectionPolicy.select(roster.list());
  }

  async function dispatchItem(item: WorkItem, worker: Worker): Promise<ItemOutcome> {
    const endTimer = metrics.workerCallDuration.startTimer();

    try {
      const reply = await workerClient.process(worker, item);

      if (reply.status === 'success') {
        endTimer({ status: 'success' });
        return { processed: true, topics: reply.topics };
      }

      endTimer({ status: 'error_reply' });
      return {
        processed: false,
        error: new WorkerCallFailedError(reply.message, item, worker.id, 'error_reply'),
      };
    } catch (error) {
      const failure = describeFailure(error, item, worker);
      endTimer({ status: failure.reason });
      return { processed: false, error: failure };
    }
  }

  async function runPass(): Promise<DistributionResult> {
    const items = [...pendingItems];
    const passId = ++passCount;
    const passLogger = logger.createChild(`pass-${passId}`);

    if (items.length === 0) {
      passLogger.info('No work items to distribute');
      metrics.distributionPassesTotal.inc({ result: 'completed' });
      return { status: 'completed', outcome: { processedCount: 0, errorCount: 0 } };
    }

    if (roster.size() === 0) {
      const error = new NoWorkersAvailableError(items.length);
      passLogger.error(error, { pendingCount: items.length });
      metrics.distributionPassesTotal.inc({ result: 'no_workers_available' });
      return { status: 'no_workers_available', error };
    }

    passLogger.info('Starting distribution', {
      items: items.length,
      workers: roster.size(),
      policy: selectionPolicy.name,
    });

    const outcome: DistributionOutcome = { processedCount: 0, errorCount: 0 };

    for (const [index, item] of items.entries()) {
      const worker = selectWorker();

      if (!worker) {
        const unassigned = items.length - index;
        outcome.errorCount += unassigned;
        metrics.itemsDispatchedTotal.inc({ outcome: 'unassigned' }, unassigned);
        passLogger.error(new NoWorkersAvailableError(unassigned), 'Roster emptied during pass', {
          unassigned,
        });
        break;
      }

      passLogger.debug('Dispatching item', {
        item,
        position: index + 1,
        of: items.length,
        workerId: worker.id,
      });

      const result = await dispatchItem(item, worker);

      if (result.processed) {
        outcome.processedCount += 1;
        metrics.itemsDispatchedTotal.inc({ outcome: 'processed' });
        metrics.topicsReportedTotal.inc(result.topics.length);
        passLogger.info('Item processed', { item, workerId: worker.id, topics: result.topics });
      } else {
        outcome.errorCount += 1;
        metrics.itemsDispatchedTotal.inc({ outcome: 'failed' });
        passLogger.error(result.error, 'Item failed');
      }
    }

    metrics.distributionPassesTotal.inc({ result: 'completed' });
    passLogger.info('Distribution completed', { ...outcome });

    return { status: 'completed', outcome };
  }

  /**
   * Runs one distribution pass over a snapshot of the pending items. A call
   * made while a pass is running starts after that pass has finished.
   */
  function distribute(): Promise<DistributionResult> {
    const pass = currentPass.then(runPass);
    // failures reach the caller through `pass`; the chain only tracks completion
    currentPass = pass.then(
      () => undefined,
      () => undefined,
    );
    return pass;
  }

  return {
    registerItems,
    registerWorker,
    unregisterWorker,
    selectWorker,
    distribute,
    getPendingItems: (): readonly WorkItem[] => pendingItems,
    getWorkers: (): readonly Worker[] => roster.list(),
  };
}

export type Dispatcher = ReturnType<typeof createDispatcher>;
