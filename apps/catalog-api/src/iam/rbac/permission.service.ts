// Import audit trail writer
import { AuditService } from '../../audit/audit.service';
// Import per-key serialization for administrative mutations
import { KeyedMutex } from '../../common/concurrency/keyed-mutex';
// Import error raised for invalid policy configuration
import { ConfigurationError } from '../../common/errors/catalog-errors';
// Import the configuration snapshot holder (public role)
import { SecurityConfigService } from '../../config/security-config.service';
// Import principal types and directory
import type { Principal } from '../principals/principal.types';
import { PrincipalDirectory } from '../principals/principal-directory';
// Import the permission universe
import { PermissionCatalog } from './permission-catalog';
// Import permission type definitions
import type { AdminActionContext, PermissionKey, RoleDefinition } from './permission.types';

/**
 * Read side of the permission model, as the operation guards see it
 */
export interface Authorizer {
  authorize(principal: Principal, permission: string): boolean;
  hasPublicRole(): boolean;
}

// Actor recorded when no caller is attached to a mutation
const SYSTEM_ACTOR = 'system';

/**
 * PermissionService - Role-based permission model
 *
 * Role permission sets are replaced wholesale; a concurrent authorize() sees the
 * old set or the new one, never a mix. Mutations are serialized per role and per
 * principal and each one is written to the audit trail.
 */
export class PermissionService implements Authorizer {
  private readonly roles = new Map<string, ReadonlySet<PermissionKey>>();
  private readonly mutex = new KeyedMutex();

  /**
   * @param catalog - Known permission universe
   * @param directory - Principal records
   * @param audit - Audit trail writer
   * @param security - Current configuration snapshot (public role)
   * @param seedRoles - Roles loaded at startup
   */
  constructor(
    private readonly catalog: PermissionCatalog,
    private readonly directory: PrincipalDirectory,
    private readonly audit: AuditService,
    private readonly security: SecurityConfigService,
    seedRoles: readonly RoleDefinition[] = []
  ) {
    for (const role of seedRoles) {
      this.assertKnownPermissions(role.name, role.permissions);
      this.roles.set(role.name, new Set(role.permissions));
    }
  }

  /**
   * Decide whether `principal` holds `permission`
   *
   * Superusers hold every permission, including tokens outside the catalog.
   * Everyone else holds the union of their roles' sets; unknown tokens are never held.
   * Never throws.
   */
  authorize(principal: Principal, permission: string): boolean {
    if (principal.kind === 'user' && principal.isSuperuser) return true;
    if (!this.catalog.has(permission)) return false;

    for (const role of this.roleNames(principal)) {
      if (this.roles.get(role)?.has(permission)) return true;
    }
    return false;
  }

  /** True when a public role is configured and defined */
  hasPublicRole(): boolean {
    const publicRole = this.security.current().rbac.publicRole;
    return publicRole !== null && this.roles.has(publicRole);
  }

  /** True when a role called `name` is defined */
  hasRole(name: string): boolean {
    return this.roles.has(name);
  }

  /**
   * Roles the principal holds right now, sorted
   * Anonymous principals hold only the public role, when one is configured
   */
  roleNames(principal: Principal): string[] {
    if (principal.kind === 'anonymous') {
      const publicRole = this.security.current().rbac.publicRole;
      return publicRole !== null && this.roles.has(publicRole) ? [publicRole] : [];
    }
    return Array.from(principal.roles)
      .filter((name) => this.roles.has(name))
      .sort();
  }

  /**
   * Every catalog permission the principal holds, sorted
   */
  effectivePermissions(principal: Principal): PermissionKey[] {
    if (principal.kind === 'user' && principal.isSuperuser) return this.catalog.list();

    const granted = new Set<PermissionKey>();
    for (const role of this.roleNames(principal)) {
      for (const permission of this.roles.get(role) ?? []) granted.add(permission);
    }
    return Array.from(granted).sort();
  }

  /** Every defined role, sorted by name */
  listRoles(): RoleDefinition[] {
    return Array.from(this.roles.entries())
      .map(([name, permissions]) => ({ name, permissions: Array.from(permissions).sort() }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Create or replace a role's permission set (never merged)
   * @param name - Role name
   * @param permissions - Full permission set of the role
   * @param context - Caller, for the audit trail
   * @returns true when the role did not exist before
   * @throws ConfigurationError for a blank name or a permission outside the catalog
   */
  async defineRole(name: string, permissions: readonly string[], context: AdminActionContext = {}): Promise<boolean> {
    const roleName = name.trim();
    if (roleName.length === 0) throw new ConfigurationError('Role name cannot be empty.');
    const keys = this.assertKnownPermissions(roleName, permissions);
    const next: ReadonlySet<PermissionKey> = new Set([...keys].sort());

    return this.mutex.runExclusive(`role:${roleName}`, async () => {
      const before = this.roles.get(roleName);
      this.roles.set(roleName, next);

      await this.audit.logRbacAction({
        actor: context.actorId ?? SYSTEM_ACTOR,
        action: 'role.define',
        targetType: 'role',
        targetId: roleName,
        before: before ? { permissions: Array.from(before) } : null,
        after: { permissions: Array.from(next) },
        requestId: context.requestId
      });

      return before === undefined;
    });
  }

  /**
   * Grant a role to a principal; a no-op when already held
   * @returns true when the role was newly assigned
   * @throws ConfigurationError for an unknown role or principal
   */
  async assignRole(principalId: string, roleName: string, context: AdminActionContext = {}): Promise<boolean> {
    if (!this.roles.has(roleName)) throw new ConfigurationError(`Unknown role "${roleName}".`);
    if (!this.directory.has(principalId)) throw new ConfigurationError(`Unknown principal "${principalId}".`);

    return this.mutex.runExclusive(`principal:${principalId}`, async () => {
      const before = this.directory.find(principalId)?.roles ?? [];
      const added = this.directory.addRole(principalId, roleName);
      if (!added) return false;

      await this.audit.logRbacAction({
        actor: context.actorId ?? SYSTEM_ACTOR,
        action: 'role.assign',
        targetType: 'principal',
        targetId: principalId,
        before: { roles: [...before] },
        after: { roles: [...(this.directory.find(principalId)?.roles ?? [])] },
        requestId: context.requestId
      });

      return true;
    });
  }

  private assertKnownPermissions(roleName: string, permissions: readonly string[]): PermissionKey[] {
    const unknown = this.catalog.unknown(permissions);
    if (unknown.length > 0) {
      throw new ConfigurationError(`Role "${roleName}" references unknown permissions: ${unknown.join(', ')}.`);
    }
    return permissions.filter((p): p is PermissionKey => this.catalog.has(p));
  }
}
