// Import Module decorator
import { Module } from '@nestjs/common';
// Import access context pieces
import { AccessContextController } from './access-context.controller';
import { AccessContextService } from './access-context.service';

/**
 * AccessContextModule - Authorization snapshot endpoint (GET /me)
 */
@Module({
  controllers: [AccessContextController],
  providers: [AccessContextService]
})
export class AccessContextModule {}
