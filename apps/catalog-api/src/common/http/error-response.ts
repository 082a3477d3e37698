// Import ErrorCode type from error codes constants
import type { ErrorCode } from './error-codes';
// Import field violation shape
import type { FieldViolation } from '../errors/catalog-errors';

/**
 * ErrorResponseBody interface - Standardized structure for all HTTP error responses
 * Used by HttpErrorFilter to format exception responses
 */
export interface ErrorResponseBody {
  /** HTTP status code (e.g., 400, 401, 403, 500) */
  statusCode: number;

  /** Application-specific error code for client-side error handling */
  errorCode: ErrorCode;

  /** Human-readable message; only ever describes policy, never internals */
  message: string;

  /** ISO 8601 timestamp when the error occurred */
  timestamp: string;

  /** Request path that triggered the error (query string excluded) */
  path: string;

  /** Request correlation ID */
  requestId?: string;

  /** Every violation found, present on validation failures only */
  violations?: FieldViolation[];
}
