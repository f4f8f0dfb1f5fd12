/**
 * Application-level errors for HTTP layer mapping.
 * Stores translate backend failures into these before returning,
 * so nothing driver-specific reaches a handler.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConflictError extends Error {
  constructor(
    message = 'Conflict',
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * The backing store could not be reached (refused, reset, timed out, shutting down).
 */
export class UnavailableError extends Error {
  constructor(message = 'Service temporarily unavailable', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnavailableError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InternalError extends Error {
  constructor(message = 'Internal error', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InternalError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RequestAbortedError extends Error {
  constructor(message = 'Request aborted by client') {
    super(message);
    this.name = 'RequestAbortedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
