/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnauthorizedError extends Error {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConflictError extends Error {
  constructor(message = 'Conflict') {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends Error {
  constructor(message = 'Validation failed') {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when the database rejects or loses a statement.
 * The driver error is kept as `cause` and never sent to clients.
 */
export class StorageError extends Error {
  constructor(message = 'Storage failure', cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
