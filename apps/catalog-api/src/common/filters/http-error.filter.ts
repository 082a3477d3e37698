// Import NestJS exception handling utilities
import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
// Import Express response type
import type { Response } from 'express';
// Import logger
import type { JsonLogger } from '../../logging/json-logger.service';
// Import domain errors
import { AuthorizationError, ConfigurationError, type FieldViolation, ValidationError } from '../errors/catalog-errors';
// Import standardized error codes
import { ERROR_CODES, type ErrorCode } from '../http/error-codes';
// Import error response body interface
import type { ErrorResponseBody } from '../http/error-response';
// Import request context helpers
import { type CatalogRequest, safePath } from '../request/request-context';

/**
 * Status, code and client-safe message derived from a thrown value
 */
export interface DescribedError {
  statusCode: number;
  errorCode: ErrorCode;
  message: string;
  violations?: FieldViolation[];
}

/**
 * Get a safe, generic error message for a given HTTP status code
 */
function safeMessageForStatus(statusCode: number): string {
  if (statusCode === HttpStatus.BAD_REQUEST) return 'Bad Request';
  if (statusCode === HttpStatus.UNAUTHORIZED) return 'Unauthorized';
  if (statusCode === HttpStatus.FORBIDDEN) return 'Forbidden';
  if (statusCode === HttpStatus.NOT_FOUND) return 'Not Found';
  if (statusCode < 500) return 'Request Failed';
  return 'Internal Server Error';
}

/**
 * Map HTTP status code to application-specific error code
 */
function errorCodeForStatus(statusCode: number): ErrorCode {
  if (statusCode === HttpStatus.UNAUTHORIZED) return ERROR_CODES.UNAUTHENTICATED;
  if (statusCode === HttpStatus.FORBIDDEN) return ERROR_CODES.FORBIDDEN;
  if (statusCode === HttpStatus.NOT_FOUND) return ERROR_CODES.NOT_FOUND;
  if (statusCode < 500) return ERROR_CODES.BAD_REQUEST;
  return ERROR_CODES.INTERNAL;
}

/**
 * Translate any thrown value into what the client may see
 * Only policy is described; internals (downstream causes, stack traces) never are
 */
export function describeException(exception: unknown): DescribedError {
  if (exception instanceof ValidationError) {
    return {
      statusCode: HttpStatus.BAD_REQUEST,
      errorCode: exception.code,
      message: 'Validation failed',
      violations: [...exception.violations]
    };
  }

  if (exception instanceof AuthorizationError) {
    const statusCode = exception.reason === 'unauthenticated' ? HttpStatus.UNAUTHORIZED : HttpStatus.FORBIDDEN;
    return { statusCode, errorCode: exception.code, message: safeMessageForStatus(statusCode) };
  }

  if (exception instanceof ConfigurationError) {
    return { statusCode: HttpStatus.BAD_REQUEST, errorCode: exception.code, message: exception.message };
  }

  // Everything else, domain errors included, is described by status only
  const statusCode = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
  return { statusCode, errorCode: errorCodeForStatus(statusCode), message: safeMessageForStatus(statusCode) };
}

/**
 * HttpErrorFilter - Global exception filter for consistent error responses
 * @Catch() with no arguments catches all exception types
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  /**
   * @param logger - Receives server-side failures with their stack
   */
  constructor(private readonly logger: JsonLogger) {}

  /**
   * Shape the error response
   * @param exception - The caught exception (can be any type)
   * @param host - ArgumentsHost providing access to request/response
   */
  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<CatalogRequest>();

    const described = describeException(exception);

    if (described.statusCode >= 500) {
      this.logger.error('Unhandled exception', {
        requestId: request.requestId,
        path: safePath(request),
        error: exception
      });
    }

    const body: ErrorResponseBody = {
      statusCode: described.statusCode,
      errorCode: described.errorCode,
      message: described.message,
      timestamp: new Date().toISOString(),
      path: safePath(request),
      requestId: request.requestId,
      ...(described.violations ? { violations: described.violations } : {})
    };

    response.status(described.statusCode).json(body);
  }
}
