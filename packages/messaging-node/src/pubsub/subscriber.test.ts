import { beforeEach, describe, expect, it, vi } from 'vitest';
import * as zmq from 'zeromq';
import { createMockDiagnosticsContext } from '@doc-analytics/service-framework-node/test';
import { createZmqTopicSubscriber } from './subscriber.js';

vi.mock('zeromq', () => ({
  Subscriber: vi.fn(),
}));

function mockSubscriberSocket(messages: Buffer[][]) {
  const socket = {
    connect: vi.fn(),
    subscribe: vi.fn(),
    close: vi.fn(),
    async *[Symbol.asyncIterator]() {
      for (const message of messages) {
        yield message;
      }
    },
  };
  (zmq.Subscriber as unknown as ReturnType<typeof vi.fn>).mockImplementation(() => socket);
  return socket;
}

async function collect(iterator: AsyncIterableIterator<string>): Promise<string[]> {
  const received: string[] = [];
  for await (const content of iterator) {
    received.push(content);
  }
  return received;
}

describe('createZmqTopicSubscriber', () => {
  const diagnosticContext = createMockDiagnosticsContext();

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should connect and subscribe to its topic', () => {
    const socket = mockSubscriberSocket([]);

    const subscriber = createZmqTopicSubscriber({
      diagnosticContext,
      address: 'tcp://127.0.0.1:5566',
      topic: 'Intro',
    });
    subscriber.connect();

    expect(socket.connect).toHaveBeenCalledWith('tcp://127.0.0.1:5566');
    expect(socket.subscribe).toHaveBeenCalledWith('Intro');
  });

  it('should yield only messages whose topic matches exactly', async () => {
    mockSubscriberSocket([
      [Buffer.from('Intro'), Buffer.from('first')],
      [Buffer.from('Introduction'), Buffer.from('prefix match')],
      [Buffer.from('Intro'), Buffer.from('second')],
    ]);

    const subscriber = createZmqTopicSubscriber({
      diagnosticContext,
      address: 'tcp://127.0.0.1:5566',
      topic: 'Intro',
    });

    expect(await collect(subscriber.receive())).toEqual(['first', 'second']);
  });

  it('should skip messages without a content frame', async () => {
    mockSubscriberSocket([[Buffer.from('Intro')], [Buffer.from('Intro'), Buffer.from('')]]);

    const subscriber = createZmqTopicSubscriber({
      diagnosticContext,
      address: 'tcp://127.0.0.1:5566',
      topic: 'Intro',
    });

    expect(await collect(subscriber.receive())).toEqual(['']);
  });

  it('should decode utf-8 content', async () => {
    mockSubscriberSocket([[Buffer.from('Überblick'), Buffer.from('naïve café')]]);

    const subscriber = createZmqTopicSubscriber({
      diagnosticContext,
      address: 'tcp://127.0.0.1:5566',
      topic: 'Überblick',
    });

    expect(await collect(subscriber.receive())).toEqual(['naïve café']);
  });
});
