// Import Global and Module decorators
import { Global, Module } from '@nestjs/common';
// Import AuditService for RBAC action records
import { AuditService } from './audit.service';

/**
 * AuditModule - Global module providing the RBAC audit trail
 */
@Global()
@Module({
  providers: [AuditService],
  exports: [AuditService]
})
export class AuditModule {}
