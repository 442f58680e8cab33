import { describeStatus } from '../protocol/command-status.js';

/** Base class for every error the client session reports to callers. */
export class SmppClientError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'SmppClientError';
    this.cause = cause;
  }
}

/** The transport could not be connected (refused, unreachable or timed out). */
export class ConnectionFailedError extends SmppClientError {
  constructor(endpoint: string, cause?: unknown) {
    super(`Connection to ${endpoint} failed`, cause);
    this.name = 'ConnectionFailedError';
  }
}

/** The SMSC rejected the bind. Every command on the session fails with this. */
export class BindFailedError extends SmppClientError {
  readonly status: number;

  constructor(status: number) {
    super(`Bind failed: ${describeStatus(status)}`);
    this.name = 'BindFailedError';
    this.status = status;
  }
}

/** The session is terminated; `cause` holds the reason it ended. */
export class SessionClosedError extends SmppClientError {
  constructor(message = 'Session closed', cause?: unknown) {
    super(message, cause);
    this.name = 'SessionClosedError';
  }
}

export class AlreadyBoundError extends SmppClientError {
  constructor() {
    super('Session is already bound');
    this.name = 'AlreadyBoundError';
  }
}

export class RequestTimeoutError extends SmppClientError {
  readonly sequenceNumber: number;

  constructor(sequenceNumber: number, timeoutMs: number) {
    super(`No response for sequence ${sequenceNumber} within ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
    this.sequenceNumber = sequenceNumber;
  }
}

/** Programming error: a sequence number was registered twice. */
export class DuplicateSequenceError extends SmppClientError {
  constructor(sequenceNumber: number) {
    super(`Sequence number ${sequenceNumber} is already pending`);
    this.name = 'DuplicateSequenceError';
  }
}
