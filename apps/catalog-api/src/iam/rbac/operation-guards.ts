// Import the authorization failure value
import { AuthorizationError } from '../../common/errors/catalog-errors';
// Import principal variant
import type { Principal } from '../principals/principal.types';
// Import the read side of the permission model
import type { Authorizer } from './permission.service';

/**
 * What a guard gets to look at
 */
export interface GuardContext {
  readonly principal: Principal;
  /** Permission the operation requires */
  readonly permission: string;
  readonly authorizer: Authorizer;
}

/**
 * A single precondition; returns the failure or null when satisfied
 */
export type OperationGuard = (context: GuardContext) => AuthorizationError | null;

/**
 * Anonymous callers are turned away unless a public role exists
 */
export const requireAuthentication: OperationGuard = ({ principal, permission, authorizer }) =>
  principal.kind === 'anonymous' && !authorizer.hasPublicRole()
    ? new AuthorizationError('unauthenticated', permission)
    : null;

/**
 * The principal must hold the operation's permission
 */
export const requirePermission: OperationGuard = ({ principal, permission, authorizer }) => {
  if (authorizer.authorize(principal, permission)) return null;
  return new AuthorizationError(principal.kind === 'anonymous' ? 'unauthenticated' : 'forbidden', permission);
};

/** Guards every gated operation runs, in order */
export const OPERATION_GUARDS: readonly OperationGuard[] = [requireAuthentication, requirePermission];

/**
 * Run guards in order and stop at the first failure
 * @returns The first failure, or null when every guard passed
 */
export function evaluateGuards(guards: readonly OperationGuard[], context: GuardContext): AuthorizationError | null {
  for (const guard of guards) {
    const failure = guard(context);
    if (failure) return failure;
  }
  return null;
}
