// Import SetMetadata to attach custom metadata to routes
import { SetMetadata } from '@nestjs/common';
// Import permission type definitions
import type { PermissionKey } from './permission.types';

// Metadata key for storing the permission a route requires
export const PERMISSION_KEY = 'iam:requiredPermission';

/**
 * @RequirePermission() decorator - Declares the permission a route handler requires
 *
 * Example:
 *   @RequirePermission('role:define')
 *
 * @param permission - Permission key in 'resource:action' form
 * @returns NestJS decorator function that attaches the requirement
 */
export function RequirePermission(permission: PermissionKey) {
  return SetMetadata(PERMISSION_KEY, permission);
}
