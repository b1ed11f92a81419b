import type { ZodType, ZodTypeDef } from 'zod';

export interface TopicPublisher {
  publish(topic: string, content: string): Promise<void>;
  close(): Promise<void>;
}

export interface TopicSubscriber {
  readonly topic: string;
  connect(): void;
  /** Yields the content frame of every message whose topic frame equals `topic`. */
  receive(): AsyncIterableIterator<string>;
  close(): void;
}

export type ReplySchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface Requester {
  request<T>(endpoint: string, payload: unknown, schema: ReplySchema<T>): Promise<T>;
}

export type RequestHandler = (request: unknown) => Promise<unknown>;

export interface Replier {
  readonly endpoint: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
}
