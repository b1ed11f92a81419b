import type { ZodIssue } from 'zod';
import type { ZmqRequestFailureReason } from '@doc-analytics/messaging-node';

export class NoWorkersAvailableError extends Error {
  readonly statusCode = 409;

  constructor(public readonly pendingCount: number) {
    super('No workers available');
    this.name = 'NoWorkersAvailable';
    Object.setPrototypeOf(this, NoWorkersAvailableError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      pendingCount: this.pendingCount,
    };
  }
}

export type WorkerCallFailureReason = ZmqRequestFailureReason | 'error_reply';

export class WorkerCallFailedError extends Error {
  constructor(
    message: string,
    public readonly item: string,
    public readonly workerId: string,
    public readonly reason: WorkerCallFailureReason,
  ) {
    super(message);
    this.name = 'WorkerCallFailed';
    Object.setPrototypeOf(this, WorkerCallFailedError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      item: this.item,
      workerId: this.workerId,
      reason: this.reason,
    };
  }
}

export class InvalidInputError extends Error {
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly details: ZodIssue[],
  ) {
    super(message);
    this.name = 'InvalidInput';
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      details: this.details,
    };
  }
}
