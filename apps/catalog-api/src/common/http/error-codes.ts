/**
 * ERROR_CODES - Machine-readable error identifiers returned to API clients
 * Using 'as const' makes the object readonly and enables precise type inference
 */
export const ERROR_CODES = {
  /** Caller is anonymous and the operation needs an authenticated principal */
  UNAUTHENTICATED: 'UNAUTHENTICATED',

  /** Caller is known but lacks the required permission */
  FORBIDDEN: 'FORBIDDEN',

  /** Input rejected by the sanitizing validator or DTO validation */
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  /** Administrative request references unknown roles or permissions */
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',

  /** Resource does not exist */
  NOT_FOUND: 'NOT_FOUND',

  /** Malformed request rejected by the framework */
  BAD_REQUEST: 'BAD_REQUEST',

  /** Internal server error or downstream failure */
  INTERNAL: 'INTERNAL'
} as const;

/**
 * ErrorCode type - Union type of all possible error code values
 */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
