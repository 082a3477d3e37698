// Import error code constants shared with the HTTP layer
import { ERROR_CODES, type ErrorCode } from '../http/error-codes';

/**
 * One rejected input field and the reason it was rejected
 */
export interface FieldViolation {
  /** Name of the field the violation came from */
  field: string;
  /** Human-readable policy message (e.g. 'Title cannot be empty.') */
  message: string;
}

/**
 * Why an authorization check failed
 * - unauthenticated: the principal is anonymous
 * - forbidden: the principal is known but lacks the permission
 */
export type AuthorizationReason = 'unauthenticated' | 'forbidden';

/**
 * CatalogError - Base class for every error the trust boundary reports
 * Carries a machine-readable code alongside the message
 */
export abstract class CatalogError extends Error {
  abstract readonly code: ErrorCode;
}

/**
 * Principal may not perform the requested operation
 */
export class AuthorizationError extends CatalogError {
  readonly code: ErrorCode;

  /**
   * @param reason - Whether the caller was anonymous or merely lacked the grant
   * @param permission - Permission token the operation required
   */
  constructor(
    readonly reason: AuthorizationReason,
    readonly permission: string
  ) {
    super(reason === 'unauthenticated' ? 'Authentication required' : `Permission ${permission} required`);
    this.name = 'AuthorizationError';
    this.code = reason === 'unauthenticated' ? ERROR_CODES.UNAUTHENTICATED : ERROR_CODES.FORBIDDEN;
  }
}

/**
 * Input failed validation; holds every violation across every field
 */
export class ValidationError extends CatalogError {
  readonly code = ERROR_CODES.VALIDATION_FAILED;

  constructor(readonly violations: readonly FieldViolation[]) {
    super('Validation failed');
    this.name = 'ValidationError';
  }
}

/**
 * Policy configuration is invalid (unknown permission, unknown role, bad seed file)
 */
export class ConfigurationError extends CatalogError {
  readonly code = ERROR_CODES.INVALID_CONFIGURATION;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A collaborator (principal lookup, repository) failed
 * The cause is kept for logging only and is never sent to clients
 */
export class DownstreamError extends CatalogError {
  readonly code = ERROR_CODES.INTERNAL;

  constructor(message: string, options: { cause: unknown }) {
    super(message, options);
    this.name = 'DownstreamError';
  }
}
