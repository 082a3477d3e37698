// Import error values carried by failed results
import type { AuthorizationError, DownstreamError, ValidationError } from '../common/errors/catalog-errors';
// Import PermissionKey type
import type { PermissionKey } from '../iam/rbac/permission.types';
// Import book shape
import type { Book } from './book.types';

/**
 * Permission each catalog operation requires
 */
export const OPERATION_PERMISSIONS = {
  list: 'book:view',
  view: 'book:view',
  create: 'book:create',
  update: 'book:edit',
  delete: 'book:delete'
} as const satisfies Record<string, PermissionKey>;

export type OperationKind = keyof typeof OPERATION_PERMISSIONS;

/** Payload of a successful operation */
export type OperationPayload = Book | readonly Book[] | null;

/**
 * OperationResult - Outcome of a gated catalog operation
 */
export type OperationResult =
  | { readonly status: 'success'; readonly resourceId: string | null; readonly payload: OperationPayload }
  | { readonly status: 'authorization_error'; readonly error: AuthorizationError }
  | { readonly status: 'validation_error'; readonly error: ValidationError }
  | { readonly status: 'not_found'; readonly resourceId: string }
  | { readonly status: 'downstream_error'; readonly error: DownstreamError };
