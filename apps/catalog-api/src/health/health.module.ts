// Import Module decorator
import { Module } from '@nestjs/common';
// Import health check controller
import { HealthController } from './health.controller';

/**
 * HealthModule - Liveness endpoint for monitoring and deployment pipelines
 */
@Module({
  controllers: [HealthController]
})
export class HealthModule {}
