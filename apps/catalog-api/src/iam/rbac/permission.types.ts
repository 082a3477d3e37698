/**
 * PermissionKey - Permission identifier of the form 'resource:action' (e.g. 'book:view')
 */
export type PermissionKey = `${string}:${string}`;

/**
 * RoleDefinition - A named role and the permissions it grants
 */
export interface RoleDefinition {
  readonly name: string;
  /** Sorted, duplicate-free */
  readonly permissions: readonly PermissionKey[];
}

/**
 * Who performed an administrative mutation, for the audit trail
 */
export interface AdminActionContext {
  /** Principal ID of the caller; 'system' for startup and scripted changes */
  readonly actorId?: string;
  readonly requestId?: string;
}
