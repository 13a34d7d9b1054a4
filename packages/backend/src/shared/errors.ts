export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, 'VALIDATION_ERROR', message);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string) {
    super(401, 'AUTHENTICATION_ERROR', message);
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string) {
    super(403, 'AUTHORIZATION_ERROR', message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
  }
}

/** A compare-and-swap write found a different stored timestamp than the one it expected. */
export class ConcurrentModificationError extends AppError {
  constructor(message: string) {
    super(409, 'CONCURRENT_MODIFICATION', message);
  }
}

/** A bundled resource (e.g. an index mapping template) is missing or unreadable. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(500, 'CONFIGURATION_ERROR', message);
  }
}

export class UnknownEntityTypeError extends AppError {
  constructor(public entityType: string) {
    super(400, 'UNKNOWN_ENTITY_TYPE', `Failed to find index doc for type ${entityType}`);
  }
}

export class UnsupportedEntityTypeError extends AppError {
  constructor(public entityType: string) {
    super(400, 'UNSUPPORTED_ENTITY_TYPE', `No document builder registered for entity type ${entityType}`);
  }
}

/** Search engine or entity store I/O failure. */
export class RemoteIOError extends AppError {
  constructor(message: string, public source?: unknown) {
    super(502, 'REMOTE_IO_ERROR', message);
  }
}

/** Normalises anything thrown into a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
