import { PROCESS_ACTION, workerReplySchema } from '@doc-analytics/interface';
import type { ProcessRequest } from '@doc-analytics/interface';
import type { Requester } from '@doc-analytics/messaging-node';
import type { WorkerClient } from './types.js';

export function createZmqWorkerClient(requester: Requester): WorkerClient {
  return {
    process: (worker, item) => {
      const request: ProcessRequest = { action: PROCESS_ACTION, item };
      return requester.request(worker.endpoint, request, workerReplySchema);
    },
  };
}
