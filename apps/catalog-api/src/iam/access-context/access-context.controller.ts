// Import NestJS controller decorators
import { Controller, Get, Req } from '@nestjs/common';
// Import Swagger decorators for API documentation
import { ApiBearerAuth, ApiOkResponse, ApiTags } from '@nestjs/swagger';
// Import request helpers
import { type CatalogRequest, extractBearerToken } from '../../common/request/request-context';
// Import principal lookup contract
import { PrincipalLookup } from '../principals/principal-lookup';
// Import access context service
import { AccessContextService } from './access-context.service';
// Import access context types
import type { AccessContext } from './types';

/**
 * AccessContextController - GET /me
 *
 * Not permission-gated: every caller may learn what it is allowed to do,
 * anonymous callers included.
 */
@ApiTags('iam')
@ApiBearerAuth('bearer')
@Controller()
export class AccessContextController {
  constructor(
    private readonly principals: PrincipalLookup,
    private readonly accessContext: AccessContextService
  ) {}

  @Get('me')
  @ApiOkResponse({ description: 'Roles, effective permissions and per-resource access of the caller' })
  async me(@Req() req: CatalogRequest): Promise<AccessContext> {
    const principal = await this.principals.resolve(extractBearerToken(req));
    req.principal = principal;
    return this.accessContext.describe(principal);
  }
}
