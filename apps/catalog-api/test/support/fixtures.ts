import type { ConfigService } from '@nestjs/config';
import type { AuditRecord, AuditService } from '../../src/audit/audit.service';
import { type AppEnv, validateEnv } from '../../src/config/env.validation';
import { SecurityConfigService } from '../../src/config/security-config.service';
import { PrincipalDirectory } from '../../src/iam/principals/principal-directory';
import type { PrincipalRecord } from '../../src/iam/principals/principal.types';
import { PermissionCatalog } from '../../src/iam/rbac/permission-catalog';
import { PermissionService } from '../../src/iam/rbac/permission.service';
import type { RoleDefinition } from '../../src/iam/rbac/permission.types';
import type { JsonLogger } from '../../src/logging/json-logger.service';

export const TEST_JWT_SECRET = 'test-secret-for-unit-tests';

export const PERMISSIONS = ['book:view', 'book:create', 'book:edit', 'book:delete', 'role:view', 'role:define', 'role:assign'];

export const ROLES: RoleDefinition[] = [
  { name: 'Viewers', permissions: ['book:view'] },
  { name: 'Editors', permissions: ['book:create', 'book:edit', 'book:view'] },
  { name: 'Admins', permissions: ['book:create', 'book:delete', 'book:edit', 'book:view'] }
];

export const PRINCIPALS: PrincipalRecord[] = [
  { id: 'viewer', email: 'viewer@example.test', superuser: false, roles: ['Viewers'] },
  { id: 'editor', email: 'editor@example.test', superuser: false, roles: ['Editors'] },
  { id: 'admin', email: 'admin@example.test', superuser: false, roles: ['Admins'] },
  { id: 'root', email: 'root@example.test', superuser: true, roles: [] },
  { id: 'nobody', email: 'nobody@example.test', superuser: false, roles: [] }
];

/** Validated env with test defaults */
export function testEnv(overrides: Record<string, unknown> = {}): AppEnv {
  return validateEnv({ AUTH_JWT_SECRET: TEST_JWT_SECRET, ...overrides });
}

/** ConfigService stand-in reading from a validated env */
export function fakeConfig(env: AppEnv): ConfigService<AppEnv, true> {
  return { get: (key: keyof AppEnv) => env[key] } as unknown as ConfigService<AppEnv, true>;
}

export function securityConfig(overrides: Record<string, unknown> = {}): SecurityConfigService {
  return new SecurityConfigService(fakeConfig(testEnv(overrides)));
}

export function fakeLogger() {
  const logger = {
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    verbose: jest.fn()
  };
  return { logger, asLogger: logger as unknown as JsonLogger };
}

export function fakeAudit() {
  const logRbacAction = jest.fn<Promise<void>, [AuditRecord]>(async () => undefined);
  return { logRbacAction, audit: { logRbacAction } as unknown as AuditService };
}

/** Permission model over the test roles and principals */
export function buildPermissionModel(options: { publicRole?: string; audit?: AuditService } = {}) {
  const security = securityConfig(options.publicRole ? { RBAC_PUBLIC_ROLE: options.publicRole } : {});
  const catalog = new PermissionCatalog(PERMISSIONS);
  const directory = new PrincipalDirectory(PRINCIPALS);
  const audit = options.audit ?? fakeAudit().audit;
  const permissions = new PermissionService(catalog, directory, audit, security, ROLES);
  return { security, catalog, directory, permissions };
}
