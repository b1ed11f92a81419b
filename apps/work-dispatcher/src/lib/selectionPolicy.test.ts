import { describe, expect, it } from 'vitest';
import {
  createRandomSelectionPolicy,
  createRoundRobinSelectionPolicy,
  createSelectionPolicy,
} from './selectionPolicy.js';
import type { Worker } from './types.js';

const workers: Worker[] = [
  { id: 'w1', endpoint: 'tcp://h1:5565' },
  { id: 'w2', endpoint: 'tcp://h2:5565' },
  { id: 'w3', endpoint: 'tcp://h3:5565' },
];

describe('createRandomSelectionPolicy', () => {
  it('should map the random value onto the roster', () => {
    const values = [0, 0.5, 0.99];
    const policy = createRandomSelectionPolicy(() => values.shift() ?? 0);

    expect([policy.select(workers), policy.select(workers), policy.select(workers)]).toEqual([
      workers[0],
      workers[1],
      workers[2],
    ]);
  });

  it('should return undefined for an empty roster', () => {
    expect(createRandomSelectionPolicy().select([])).toBeUndefined();
  });

  it('should only ever pick registered workers', () => {
    const policy = createRandomSelectionPolicy();

    for (let i = 0; i < 50; i++) {
      expect(workers).toContain(policy.select(workers));
    }
  });
});

describe('createRoundRobinSelectionPolicy', () => {
  it('should cycle through the roster', () => {
    const policy = createRoundRobinSelectionPolicy();

    const picked = [1, 2, 3, 4].map(() => policy.select(workers)?.id);

    expect(picked).toEqual(['w1', 'w2', 'w3', 'w1']);
  });

  it('should stay in range when the roster shrinks', () => {
    const policy = createRoundRobinSelectionPolicy();
    policy.select(workers);
    policy.select(workers);

    expect(policy.select(workers.slice(0, 1))?.id).toBe('w1');
  });
});

describe('createSelectionPolicy', () => {
  it('should build policies by name', () => {
    expect(createSelectionPolicy('random').name).toBe('random');
    expect(createSelectionPolicy('round-robin').name).toBe('round-robin');
  });
});
