/**
 * Errors - Failures that terminate a request with a fixed status
 *
 * Every error the request pipeline raises on purpose extends ApiError,
 * carrying the HTTP status and a single-sentence message that is safe
 * to show the client. The error middleware turns these into
 * `{ "message": ... }` responses.
 *
 * @module errors
 * @category Errors
 */

/**
 * Base class for errors that map to an HTTP response.
 */
export class ApiError extends Error {
  /** HTTP status code sent to the client */
  readonly status: number;

  /** Error code for programmatic handling */
  readonly code: string;

  constructor(message: string, status: number, code?: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code ?? 'API_ERROR';
  }
}

/**
 * The client does not accept the media type the server produces.
 */
export class NotAcceptableError extends ApiError {
  constructor(mimeType: string) {
    super(`Request must accept ${mimeType} data`, 406, 'NOT_ACCEPTABLE');
    this.name = 'NotAcceptableError';
  }
}

/**
 * The request body is not in a media type the server consumes.
 */
export class UnsupportedMediaTypeError extends ApiError {
  constructor(mimeType: string) {
    super(`Request must contain ${mimeType} data`, 415, 'UNSUPPORTED_MEDIA_TYPE');
    this.name = 'UnsupportedMediaTypeError';
  }
}

/**
 * The request payload does not match the post shape.
 */
export class ValidationError extends ApiError {
  /** The field that failed, when the failure is tied to one */
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, 422, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * No post exists under the requested id.
 */
export class NotFoundError extends ApiError {
  /** The id as it appeared in the request path */
  readonly id: string | number;

  constructor(id: string | number) {
    super(`Could not find post with id ${id}`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
    this.id = id;
  }
}

/**
 * The route exists but not for this HTTP method.
 */
export class MethodNotAllowedError extends ApiError {
  /** Methods the route does support, for the Allow header */
  readonly allowed: readonly string[];

  constructor(allowed: readonly string[]) {
    super('Method not allowed', 405, 'METHOD_NOT_ALLOWED');
    this.name = 'MethodNotAllowedError';
    this.allowed = allowed;
  }
}

/**
 * Type guard for errors carrying an HTTP status.
 */
export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}
