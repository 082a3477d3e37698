// Import NestJS module utilities
import { Global, Module } from '@nestjs/common';
// Import the configuration snapshot holder
import { SecurityConfigService } from '../config/security-config.service';

/**
 * SecurityModule - Shares the current SecuritySnapshot
 * Global because header hardening, validation and RBAC all read it
 */
@Global()
@Module({
  providers: [SecurityConfigService],
  exports: [SecurityConfigService]
})
export class SecurityModule {}
