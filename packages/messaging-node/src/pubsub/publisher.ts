import * as zmq from 'zeromq';
import type { SF } from '@doc-analytics/service-framework-node';
import { InvalidTopicError } from '../errors.js';
import type { TopicPublisher } from '../types.js';

interface ZmqTopicPublisherOptions {
  diagnosticContext: SF.DiagnosticContext;
  address: string;
}

export interface ZmqTopicPublisher extends TopicPublisher {
  socket: zmq.Publisher;
}

export function assertValidTopic(topic: string): void {
  if (topic.length === 0 || topic.includes('\0')) {
    throw new InvalidTopicError(topic);
  }
}

/**
 * Binds a PUB socket and sends `[topic, content]` frames. Publishes are
 * chained so a send never starts before the previous one settled.
 */
export async function createZmqTopicPublisher(
  options: ZmqTopicPublisherOptions,
): Promise<ZmqTopicPublisher> {
  const { diagnosticContext, address } = options;
  const socket = new zmq.Publisher();
  let sendingPromise: Promise<void> = Promise.resolve();
  let queued = 0;

  await socket.bind(address);
  diagnosticContext.logger.info('[ZmqTopicPublisher] Bound', { address });

  return {
    socket,
    publish: async (topic: string, content: string): Promise<void> => {
      assertValidTopic(topic);

      queued += 1;
      diagnosticContext.logger.debug('[ZmqTopicPublisher] Publishing', {
        topic,
        queued,
      });

      const sent = sendingPromise.then(() => socket.send([topic, content]));
      sendingPromise = sent
        .catch((error: unknown) => {
          diagnosticContext.logger.error(error, '[ZmqTopicPublisher] Send failed', { topic });
        })
        .finally(() => {
          queued -= 1;
        });

      return sent;
    },
    close: async (): Promise<void> => {
      await sendingPromise;
      socket.close();
      diagnosticContext.logger.info('[ZmqTopicPublisher] Closed', { address });
    },
  };
}
