export { ZmqRequestError, InvalidTopicError } from './errors.js';
export type { ZmqRequestFailureReason } from './errors.js';
export { assertValidTopic, createZmqTopicPublisher } from './pubsub/publisher.js';
export type { ZmqTopicPublisher } from './pubsub/publisher.js';
export { createZmqTopicSubscriber } from './pubsub/subscriber.js';
export type { ZmqTopicSubscriber } from './pubsub/subscriber.js';
export { createZmqRequester } from './reqrep/requester.js';
export { createZmqReplier, invalidRequestReply } from './reqrep/replier.js';
export type {
  Replier,
  ReplySchema,
  RequestHandler,
  Requester,
  TopicPublisher,
  TopicSubscriber,
} from './types.js';
