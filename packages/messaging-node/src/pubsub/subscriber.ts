import * as zmq from 'zeromq';
import type { SF } from '@doc-analytics/service-framework-node';
import type { TopicSubscriber } from '../types.js';

interface ZmqTopicSubscriberOptions {
  diagnosticContext: SF.DiagnosticContext;
  address: string;
  topic: string;
}

export interface ZmqTopicSubscriber extends TopicSubscriber {
  socket: zmq.Subscriber;
}

export function createZmqTopicSubscriber(options: ZmqTopicSubscriberOptions): ZmqTopicSubscriber {
  const { diagnosticContext, address, topic } = options;
  const socket = new zmq.Subscriber();

  return {
    socket,
    topic,
    connect: (): void => {
      diagnosticContext.logger.info('[ZmqTopicSubscriber] Connecting', { address, topic });
      socket.connect(address);
      socket.subscribe(topic);
    },
    receive: async function* (): AsyncIterableIterator<string> {
      for await (const [topicFrame, contentFrame] of socket) {
        const receivedTopic = topicFrame?.toString('utf8');

        // SUB filtering is by prefix; "Intro" also matches "Introduction".
        if (receivedTopic !== topic) {
          diagnosticContext.logger.debug('[ZmqTopicSubscriber] Skipping foreign topic', {
            receivedTopic,
          });
          continue;
        }

        if (contentFrame === undefined) {
          diagnosticContext.logger.warn('[ZmqTopicSubscriber] Message without content frame', {
            topic,
          });
          continue;
        }

        yield contentFrame.toString('utf8');
      }
      diagnosticContext.logger.info('[ZmqTopicSubscriber] Done receiving messages', { topic });
    },
    close: (): void => {
      socket.close();
    },
  };
}
