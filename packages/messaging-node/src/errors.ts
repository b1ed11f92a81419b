export type ZmqRequestFailureReason = 'timeout' | 'transport' | 'decode';

export class ZmqRequestError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly reason: ZmqRequestFailureReason,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'ZmqRequestError';
    Object.setPrototypeOf(this, ZmqRequestError.prototype);
  }

  toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      endpoint: this.endpoint,
      reason: this.reason,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

export class InvalidTopicError extends Error {
  constructor(public readonly topic: string) {
    super(
      topic.length === 0 ? 'Topic must not be empty' : 'Topic must not contain NUL bytes',
    );
    this.name = 'InvalidTopicError';
    Object.setPrototypeOf(this, InvalidTopicError.prototype);
  }

  toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      topic: this.topic,
    };
  }
}
