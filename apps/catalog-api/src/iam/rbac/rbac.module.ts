// Import path helpers to resolve the seed file
import { resolve } from 'node:path';
// Import NestJS module utilities
import { Global, Module } from '@nestjs/common';
// Import ConfigService for the seed file location
import { ConfigService } from '@nestjs/config';
// Import audit trail writer
import { AuditService } from '../../audit/audit.service';
// Import validated environment type
import type { AppEnv } from '../../config/env.validation';
// Import seed loader
import { loadRbacSeed, type RbacSeed } from '../../config/rbac-seed.loader';
// Import the configuration snapshot holder
import { SecurityConfigService } from '../../config/security-config.service';
// Import logger
import { JsonLogger } from '../../logging/json-logger.service';
// Import principal pieces
import { JwtPrincipalLookup } from '../principals/jwt-principal.lookup';
import { PrincipalDirectory } from '../principals/principal-directory';
import { PrincipalLookup } from '../principals/principal-lookup';
// Import RBAC pieces
import { PermissionCatalog } from './permission-catalog';
import { PermissionGuard } from './permission.guard';
import { PermissionService } from './permission.service';

// Injection token for the validated seed document
export const RBAC_SEED = Symbol('RBAC_SEED');

/**
 * RbacModule - Permission model, principal resolution and the permission guard
 * Global so every feature module can gate routes and operations
 */
@Global()
@Module({
  providers: [
    {
      provide: RBAC_SEED,
      useFactory: (config: ConfigService<AppEnv, true>, security: SecurityConfigService, logger: JsonLogger): RbacSeed => {
        const file = resolve(process.cwd(), config.get('RBAC_SEED_FILE', { infer: true }));
        const seed = loadRbacSeed(file, security.current().rbac.publicRole);
        logger.log('RBAC seed loaded', {
          file,
          permissions: seed.permissions.length,
          roles: seed.roles.length,
          principals: seed.principals.length
        });
        return seed;
      },
      inject: [ConfigService, SecurityConfigService, JsonLogger]
    },
    {
      provide: PermissionCatalog,
      useFactory: (seed: RbacSeed) => new PermissionCatalog(seed.permissions),
      inject: [RBAC_SEED]
    },
    {
      provide: PrincipalDirectory,
      useFactory: (seed: RbacSeed) => new PrincipalDirectory(seed.principals),
      inject: [RBAC_SEED]
    },
    {
      provide: PermissionService,
      useFactory: (
        seed: RbacSeed,
        catalog: PermissionCatalog,
        directory: PrincipalDirectory,
        audit: AuditService,
        security: SecurityConfigService
      ) => new PermissionService(catalog, directory, audit, security, seed.roles),
      inject: [RBAC_SEED, PermissionCatalog, PrincipalDirectory, AuditService, SecurityConfigService]
    },
    { provide: PrincipalLookup, useClass: JwtPrincipalLookup },
    PermissionGuard
  ],
  exports: [PermissionCatalog, PrincipalDirectory, PermissionService, PrincipalLookup, PermissionGuard]
})
export class RbacModule {}
