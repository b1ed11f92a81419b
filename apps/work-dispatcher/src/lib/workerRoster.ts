import type { Worker } from './types.js';

/**
 * Insertion-ordered list of workers. Duplicate ids and endpoints are kept as
 * separate entries; removal by id drops all of them.
 */
export function createWorkerRoster() {
  let workers: Worker[] = [];

  function add(worker: Worker): void {
    workers.push({ id: worker.id, endpoint: worker.endpoint });
  }

  function removeById(id: string): number {
    const before = workers.length;
    workers = workers.filter((worker) => worker.id !== id);
    return before - workers.length;
  }

  function list(): readonly Worker[] {
    return workers;
  }

  function size(): number {
    return workers.length;
  }

  return {
    add,
    removeById,
    list,
    size,
  };
}

export type WorkerRoster = ReturnType<typeof createWorkerRoster>;
