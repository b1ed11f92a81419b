import type { SelectionPolicy, Worker } from './types.js';

export type SelectionPolicyName = 'random' | 'round-robin';

/** Uniform choice with replacement: the same worker can take several items in a row. */
export function createRandomSelectionPolicy(random: () => number = Math.random): SelectionPolicy {
  return {
    name: 'random',
    select: (workers: readonly Worker[]) => {
      if (workers.length === 0) {
        return undefined;
      }
      return workers[Math.floor(random() * workers.length)];
    },
  };
}

export function createRoundRobinSelectionPolicy(): SelectionPolicy {
  let next = 0;

  return {
    name: 'round-robin',
    select: (workers: readonly Worker[]) => {
      if (workers.length === 0) {
        return undefined;
      }
      const worker = workers[next % workers.length];
      next = (next + 1) % workers.length;
      return worker;
    },
  };
}

export function createSelectionPolicy(name: SelectionPolicyName): SelectionPolicy {
  switch (name) {
    case 'random':
      return createRandomSelectionPolicy();
    case 'round-robin':
      return createRoundRobinSelectionPolicy();
  }
}
