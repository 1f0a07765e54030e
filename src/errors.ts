export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Missing or rejected Gemini API key. */
export class CredentialError extends AppError {
  constructor(message: string) {
    super(message, 401);
  }
}

export class SessionNotFoundError extends AppError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 404);
  }
}

/** The session has nothing extracted yet, so there is nothing to edit, save or export. */
export class NoRecordError extends AppError {
  constructor() {
    super('No extracted record in this session', 409);
  }
}

export class InvalidEditError extends AppError {
  readonly fields: string[];

  constructor(fields: string[]) {
    super(`Fields cannot be edited: ${fields.join(', ')}`, 400);
    this.fields = fields;
  }
}

export class UnsupportedImageError extends AppError {
  constructor(message: string) {
    super(message, 415);
  }
}

/**
 * Every backend failed. `errors` holds one message per backend, in call order.
 */
export class ExtractionFailedError extends AppError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super('All models failed to process the image. Check the API key, quotas and image quality.', 502);
    this.errors = errors;
  }
}

export class MalformedResponseError extends AppError {
  constructor(message: string) {
    super(message, 502);
  }
}

export class StoreIOError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

export class StoreFormatError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}
