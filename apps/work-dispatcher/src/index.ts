export { createDispatcher } from './lib/dispatcher.js';
export type { Dispatcher } from './lib/dispatcher.js';
export { NoWorkersAvailableError, WorkerCallFailedError, InvalidInputError } from './lib/errors.js';
export {
  createRandomSelectionPolicy,
  createRoundRobinSelectionPolicy,
  createSelectionPolicy,
} from './lib/selectionPolicy.js';
export { createZmqWorkerClient } from './lib/zmqWorkerClient.js';
export type {
  DistributionOutcome,
  DistributionResult,
  SelectionPolicy,
  WorkerClient,
} from './lib/types.js';
