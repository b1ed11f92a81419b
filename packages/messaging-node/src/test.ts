import { vi } from 'vitest';
import { ZmqRequestError } from './errors.js';
import { assertValidTopic } from './pubsub/publisher.js';
import type {
  ReplySchema,
  RequestHandler,
  Requester,
  TopicPublisher,
  TopicSubscriber,
} from './types.js';

export interface PublishedMessage {
  topic: string;
  content: string;
}

interface InMemoryTopicSubscriber extends TopicSubscriber {
  isConnected(): boolean;
  deliver(content: string): void;
}

function createInMemoryTopicSubscriber(topic: string): InMemoryTopicSubscriber {
  const buffer: string[] = [];
  let wake: (() => void) | undefined;
  let connected = false;
  let closed = false;

  return {
    topic,
    isConnected: () => connected,
    connect: () => {
      connected = true;
    },
    deliver: (content) => {
      buffer.push(content);
      wake?.();
    },
    receive: async function* () {
      while (!closed) {
        const next = buffer.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = undefined;
      }
    },
    close: () => {
      closed = true;
      wake?.();
    },
  };
}

/**
 * Broadcast bus living inside the test process. Delivery follows the wire
 * rules: exact topic match, and nothing for subscribers that connect late.
 */
export function createInMemoryBroadcastBus() {
  const published: PublishedMessage[] = [];
  const subscribers = new Set<InMemoryTopicSubscriber>();

  const publisher: TopicPublisher = {
    publish: async (topic, content) => {
      assertValidTopic(topic);
      published.push({ topic, content });
      for (const subscriber of subscribers) {
        if (subscriber.isConnected() && subscriber.topic === topic) {
          subscriber.deliver(content);
        }
      }
    },
    close: async () => undefined,
  };

  return {
    publisher,
    published,
    subscribe: (topic: string): TopicSubscriber => {
      const subscriber = createInMemoryTopicSubscriber(topic);
      subscribers.add(subscriber);
      return subscriber;
    },
  };
}

export type InMemoryBroadcastBus = ReturnType<typeof createInMemoryBroadcastBus>;

/**
 * Requester that routes each endpoint to an in-process handler. Payloads and
 * replies go through JSON like they would on the wire; unknown endpoints fail
 * as transport errors.
 */
export function createInMemoryRequester(
  handlers: Record<string, RequestHandler>,
): Requester & { calls: Array<{ endpoint: string; payload: unknown }> } {
  const calls: Array<{ endpoint: string; payload: unknown }> = [];

  return {
    calls,
    request: async <T>(endpoint: string, payload: unknown, schema: ReplySchema<T>): Promise<T> => {
      calls.push({ endpoint, payload });

      const handler = handlers[endpoint];
      if (!handler) {
        throw new ZmqRequestError(`No handler bound at ${endpoint}`, endpoint, 'transport');
      }

      const reply: unknown = JSON.parse(
        JSON.stringify(await handler(JSON.parse(JSON.stringify(payload)))),
      );
      const parsed = schema.safeParse(reply);
      if (!parsed.success) {
        throw new ZmqRequestError(
          `Reply from ${endpoint} does not match the expected shape`,
          endpoint,
          'decode',
          parsed.error.issues,
        );
      }
      return parsed.data;
    },
  };
}

export function createMockTopicPublisher(): TopicPublisher {
  return {
    publish: vi.fn(() => Promise.resolve()),
    close: vi.fn(() => Promise.resolve()),
  };
}
