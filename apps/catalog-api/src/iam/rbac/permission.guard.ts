// Import NestJS guard types
import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
// Import Reflector to read decorator metadata
import { Reflector } from '@nestjs/core';
// Import authorization failure value
import { AuthorizationError } from '../../common/errors/catalog-errors';
// Import request helpers
import { type CatalogRequest, extractBearerToken } from '../../common/request/request-context';
// Import principal lookup contract
import { PrincipalLookup } from '../principals/principal-lookup';
// Import guard pipeline
import { evaluateGuards, OPERATION_GUARDS } from './operation-guards';
// Import permission decorator metadata key
import { PERMISSION_KEY } from './permission.decorator';
// Import the permission model
import { PermissionService } from './permission.service';

/**
 * PermissionGuard - Route guard running the same guard pipeline as catalog operations
 *
 * Flow:
 * 1. Read the required permission from @RequirePermission() (fail closed if absent)
 * 2. Resolve the principal from the bearer token (cached on the request)
 * 3. Run OPERATION_GUARDS; throw the AuthorizationError on failure
 *
 * Usage: @UseGuards(PermissionGuard) with @RequirePermission('role:view')
 */
@Injectable()
export class PermissionGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly principals: PrincipalLookup,
    private readonly permissions: PermissionService
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<CatalogRequest>();

    // Checks both method-level and class-level decorators
    const permission = this.reflector.getAllAndOverride<string | undefined>(PERMISSION_KEY, [
      context.getHandler(),
      context.getClass()
    ]);

    // Fail closed if no permission was declared
    if (!permission) throw new AuthorizationError('forbidden', '(undeclared)');

    if (!request.principal) {
      request.principal = await this.principals.resolve(extractBearerToken(request));
    }

    const denied = evaluateGuards(OPERATION_GUARDS, {
      principal: request.principal,
      permission,
      authorizer: this.permissions
    });
    if (denied) throw denied;

    return true;
  }
}
