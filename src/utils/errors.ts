/**
 * Error types
 *
 * Page-level errors travel inside a PageResult and are handled by the
 * retrieval controller. Only ResolutionError and ConfigurationError are thrown
 * to the caller, before any retrieval starts.
 */

export type ErrorCode =
  | 'HTTP_ERROR'
  | 'CONNECTION_ERROR'
  | 'TIMEOUT'
  | 'REQUEST_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'DECODE_ERROR'
  | 'RESOLUTION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'FIELD_EXTRACTION_ERROR'
  | 'MALFORMED_REVIEW';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientHttpError extends AppError {
  readonly code = 'HTTP_ERROR';

  constructor(readonly status: number) {
    super(`Request failed with status ${status}`);
  }
}

export class ConnectionError extends AppError {
  readonly code = 'CONNECTION_ERROR';
}

export class RequestTimeoutError extends AppError {
  readonly code = 'TIMEOUT';
}

export class GenericRequestError extends AppError {
  readonly code = 'REQUEST_ERROR';
}

export class MalformedResponseError extends AppError {
  readonly code = 'MALFORMED_RESPONSE';
}

export class DecodeError extends AppError {
  readonly code = 'DECODE_ERROR';
}

export class ResolutionError extends AppError {
  readonly code = 'RESOLUTION_ERROR';
}

export class ConfigurationError extends AppError {
  readonly code = 'CONFIGURATION_ERROR';
}

/**
 * Raised by a field coercion; always recovered by falling back to the field default
 */
export class FieldExtractionError extends AppError {
  readonly code = 'FIELD_EXTRACTION_ERROR';

  constructor(
    readonly field: string,
    message: string
  ) {
    super(`${field}: ${message}`);
  }
}

/**
 * The review payload is not an object at all, so no field can be read
 */
export class MalformedReviewError extends AppError {
  readonly code = 'MALFORMED_REVIEW';
}

/**
 * Errors a single page attempt can end with
 */
export type PageFetchError =
  | TransientHttpError
  | ConnectionError
  | RequestTimeoutError
  | GenericRequestError
  | MalformedResponseError
  | DecodeError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
