export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
    Object.setPrototypeOf(this, CliUsageError.prototype);
  }
}

export class AggregatorQueryError extends Error {
  constructor(
    message: string,
    public readonly topic: string,
    public readonly endpoint: string,
  ) {
    super(message);
    this.name = 'AggregatorQueryError';
    Object.setPrototypeOf(this, AggregatorQueryError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      topic: this.topic,
      endpoint: this.endpoint,
    };
  }
}
