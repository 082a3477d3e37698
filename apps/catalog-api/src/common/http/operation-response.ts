// Import NestJS not-found exception
import { NotFoundException } from '@nestjs/common';
// Import operation result union
import type { OperationPayload, OperationResult } from '../../catalog/catalog-operation.types';

/**
 * Unwrap a successful operation result, or throw what the error filter maps to a status
 * - authorization_error: 401 (anonymous) or 403
 * - validation_error: 400 with every violation
 * - not_found: 404
 * - downstream_error: 500 with a generic message
 */
export function unwrapOperation(result: OperationResult): OperationPayload {
  switch (result.status) {
    case 'success':
      return result.payload;
    case 'not_found':
      throw new NotFoundException();
    case 'authorization_error':
    case 'validation_error':
    case 'downstream_error':
      throw result.error;
  }
}
