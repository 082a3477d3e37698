// Import NestJS Injectable decorator
import { Injectable } from '@nestjs/common';
// Import principal variant
import type { Principal } from '../principals/principal.types';
// Import RBAC pieces
import { PermissionCatalog } from '../rbac/permission-catalog';
import { buildResourceAccessMap } from '../rbac/permission.parser';
import { PermissionService } from '../rbac/permission.service';
// Import access context types
import type { AccessContext } from './types';

/**
 * AccessContextService - Builds the authorization snapshot of a principal
 */
@Injectable()
export class AccessContextService {
  constructor(
    private readonly permissions: PermissionService,
    private readonly catalog: PermissionCatalog
  ) {}

  /**
   * @param principal - Resolved caller (anonymous callers get the public role's view)
   */
  describe(principal: Principal): AccessContext {
    const granted = this.permissions.effectivePermissions(principal);
    return {
      principal:
        principal.kind === 'anonymous'
          ? { kind: 'anonymous' }
          : { kind: 'user', id: principal.id, email: principal.email, isSuperuser: principal.isSuperuser },
      roles: this.permissions.roleNames(principal),
      permissions: granted,
      resources: buildResourceAccessMap({
        allPermissionKeys: this.catalog.list(),
        grantedPermissionKeys: granted
      })
    };
  }
}
