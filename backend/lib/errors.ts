import type { ErrorStatusCode } from './response';

/**
 * Base class for errors that map onto an HTTP error response.
 * The handler turns these into {@link createErrorResponse} calls; anything
 * else that escapes a route becomes a 500.
 */
export class HttpError extends Error {
  readonly statusCode: ErrorStatusCode;

  constructor(statusCode: ErrorStatusCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/** Missing or malformed header, body or field (400). */
export class ValidationError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

/** Family header present but not on the allow-list (403). */
export class ForbiddenFamilyError extends HttpError {
  constructor(message = 'Family id not authorized') {
    super(403, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not found') {
    super(404, message);
  }
}

/**
 * S3 or DynamoDB call failed (502).
 * The SDK error is kept as `cause` so it reaches the logs but not the client.
 */
export class CollaboratorError extends HttpError {
  constructor(message: string, cause: unknown) {
    super(502, message, { cause });
  }
}
