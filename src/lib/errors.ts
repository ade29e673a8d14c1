export type FieldErrors = Record<string, string[]>;

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message };
  }
}

/**
 * Malformed or out-of-range input. Always names the offending field(s).
 */
export class ValidationError extends HttpError {
  readonly fields: FieldErrors;

  constructor(fields: FieldErrors, message = 'Validation failed') {
    super(400, message);
    this.fields = fields;
  }

  static field(field: string, message: string): ValidationError {
    return new ValidationError({ [field]: [message] });
  }

  override toJSON(): Record<string, unknown> {
    return { error: this.message, fields: this.fields };
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class AuthenticationError extends HttpError {
  constructor(message = 'Authentication credentials were not provided') {
    super(401, message);
  }
}

export class AuthorizationError extends HttpError {
  constructor(message = 'Forbidden: Insufficient permissions') {
    super(403, message);
  }
}

// Used both for "does not exist" and "exists but is not yours"
export class NotFoundError extends HttpError {
  constructor(message = 'Not found') {
    super(404, message);
  }
}

export class MethodNotAllowedError extends HttpError {
  readonly allow: string[];

  constructor(method: string, allow: string[] = [], message?: string) {
    super(405, message ?? `Method "${method}" not allowed.`);
    this.allow = allow;
  }
}

/** Thrown by repositories when a unique index rejects a write. */
export class DuplicateEntryError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Duplicate entry for ${key}`);
    this.name = 'DuplicateEntryError';
    this.key = key;
  }
}
