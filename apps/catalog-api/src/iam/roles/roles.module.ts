// Import Module decorator
import { Module } from '@nestjs/common';
// Import role administration controller
import { RoleController } from './role.controller';

/**
 * RolesModule - Role administration endpoints
 * The permission model itself comes from the global RbacModule
 */
@Module({
  controllers: [RoleController]
})
export class RolesModule {}
