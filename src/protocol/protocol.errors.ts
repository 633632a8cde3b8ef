import { FormattedError } from './operation-message.types';

/** A frame that is not a well-formed protocol message. */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

/** A well-formed message that is not allowed in the connection's current state. */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}

export class DuplicateOperationIdError extends Error {
  constructor(readonly operationId: string) {
    super(`Operation id "${operationId}" is already in use`);
    this.name = 'DuplicateOperationIdError';
  }
}

/**
 * Failure reported by the GraphQL engine: parse and validation errors, or a
 * subscription that could not be set up.
 */
export class ExecutionError extends Error {
  readonly errors: readonly FormattedError[];

  constructor(errors: readonly FormattedError[]) {
    super(errors.map((e) => e.message).join('; ') || 'Execution failed');
    this.name = 'ExecutionError';
    this.errors = errors.length ? errors : [{ message: this.message }];
  }
}

/** The underlying channel failed; the connection cannot continue. */
export class TransportError extends Error {
  constructor(
    message: string,
    readonly reason?: unknown,
  ) {
    super(message);
    this.name = 'TransportError';
  }
}
