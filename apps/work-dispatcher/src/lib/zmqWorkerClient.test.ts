import { describe, expect, it } from 'vitest';
import { ZmqRequestError } from '@doc-analytics/messaging-node';
import { createInMemoryRequester } from '@doc-analytics/messaging-node/test';
import { createZmqWorkerClient } from './zmqWorkerClient.js';

const worker = { id: 'w1', endpoint: 'inproc://w1' };

describe('createZmqWorkerClient', () => {
  it('should send a process request to the worker endpoint', async () => {
    const requester = createInMemoryRequester({
      'inproc://w1': async () => ({ status: 'success', topics: ['A'], topicsFound: 1, item: 'a.md' }),
    });

    const reply = await createZmqWorkerClient(requester).process(worker, 'a.md');

    expect(requester.calls).toEqual([
      { endpoint: 'inproc://w1', payload: { action: 'process', item: 'a.md' } },
    ]);
    expect(reply).toEqual({ status: 'success', topics: ['A'], topicsFound: 1, item: 'a.md' });
  });

  it('should accept success replies without topicsFound or item', async () => {
    const requester = createInMemoryRequester({
      'inproc://w1': async () => ({ status: 'success', topics: ['A', 'B'] }),
    });

    await expect(createZmqWorkerClient(requester).process(worker, 'a.md')).resolves.toEqual({
      status: 'success',
      topics: ['A', 'B'],
    });
  });

  it('should reject malformed replies as decode failures', async () => {
    const requester = createInMemoryRequester({
      'inproc://w1': async () => ({ status: 'success' }),
    });

    await expect(createZmqWorkerClient(requester).process(worker, 'a.md')).rejects.toMatchObject({
      name: 'ZmqRequestError',
      reason: 'decode',
    });
  });

  it('should surface unreachable workers as transport failures', async () => {
    const requester = createInMemoryRequester({});

    await expect(createZmqWorkerClient(requester).process(worker, 'a.md')).rejects.toBeInstanceOf(
      ZmqRequestError,
    );
  });
});
