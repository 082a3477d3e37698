// Import NestJS decorators for controllers
import { Controller, Get } from '@nestjs/common';
// Import Swagger decorators
import { ApiTags } from '@nestjs/swagger';

/**
 * HealthController - Liveness endpoint
 * Route: GET /health
 * Used by load balancers and monitoring to verify service availability
 */
@ApiTags('health')
@Controller('health')
export class HealthController {
  @Get()
  health() {
    return { ok: true, service: 'catalog-api' };
  }
}
