import type { WorkItem, Worker, WorkerReply } from '@doc-analytics/interface';
import type { NoWorkersAvailableError } from './errors.js';

export type { WorkItem, Worker };

export interface DistributionOutcome {
  processedCount: number;
  errorCount: number;
}

export type DistributionResult =
  | { status: 'completed'; outcome: DistributionOutcome }
  | { status: 'no_workers_available'; error: NoWorkersAvailableError };

export interface SelectionPolicy {
  readonly name: string;
  select(workers: readonly Worker[]): Worker | undefined;
}

/** Sends one work item to one worker and returns its decoded reply. */
export interface WorkerClient {
  process(worker: Worker, item: WorkItem): Promise<WorkerReply>;
}
