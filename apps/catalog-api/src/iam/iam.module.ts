// Import Module decorator
import { Module } from '@nestjs/common';
// Import IAM feature modules
import { AccessContextModule } from './access-context/access-context.module';
import { RbacModule } from './rbac/rbac.module';
import { RolesModule } from './roles/roles.module';

/**
 * IamModule - Identity and Access Management
 * Aggregates:
 * - RBAC enforcement and principal resolution
 * - Role administration
 * - Access context inspection
 */
@Module({
  imports: [RbacModule, RolesModule, AccessContextModule]
})
export class IamModule {}
