// Import NestJS controller decorators
import { Body, Controller, Get, NotFoundException, Param, Post, Put, Req, Res, UseGuards } from '@nestjs/common';
// Import Express Response type
import type { Response } from 'express';
// Import Swagger decorators for API documentation
import { ApiBearerAuth, ApiBody, ApiTags } from '@nestjs/swagger';
// Import request context type
import type { CatalogRequest } from '../../common/request/request-context';
// Import principal records
import { PrincipalDirectory } from '../principals/principal-directory';
// Import RBAC guard, decorator and model
import { RequirePermission } from '../rbac/permission.decorator';
import { PermissionGuard } from '../rbac/permission.guard';
import { PermissionService } from '../rbac/permission.service';
import type { AdminActionContext, RoleDefinition } from '../rbac/permission.types';
// Import DTOs
import { AssignRoleDto } from './dto/assign-role.dto';
import { DefineRoleDto } from './dto/define-role.dto';

/**
 * Audit context of the calling principal
 */
function actionContext(req: CatalogRequest): AdminActionContext {
  return {
    actorId: req.principal?.kind === 'user' ? req.principal.id : undefined,
    requestId: req.requestId
  };
}

/**
 * RoleController - Role administration
 * Routes: /admin/roles, /admin/principals/:id/roles
 *
 * Every route runs PermissionGuard with the permission it declares.
 */
@ApiTags('admin-iam')
@ApiBearerAuth('bearer')
@Controller('admin')
@UseGuards(PermissionGuard)
export class RoleController {
  constructor(
    private readonly permissions: PermissionService,
    private readonly directory: PrincipalDirectory
  ) {}

  @Get('roles')
  @RequirePermission('role:view')
  list(): RoleDefinition[] {
    return this.permissions.listRoles();
  }

  /**
   * Create or replace a role; 201 when created, 200 when replaced
   */
  @Put('roles/:name')
  @RequirePermission('role:define')
  @ApiBody({
    type: DefineRoleDto,
    examples: {
      basic: {
        summary: 'Define a reviewer role',
        value: { permissions: ['book:view', 'book:edit'] }
      }
    }
  })
  async define(
    @Param('name') name: string,
    @Body() dto: DefineRoleDto,
    @Req() req: CatalogRequest,
    @Res({ passthrough: true }) res: Response
  ): Promise<RoleDefinition & { created: boolean }> {
    const created = await this.permissions.defineRole(name, dto.permissions, actionContext(req));
    res.status(created ? 201 : 200);
    const role = this.permissions.listRoles().find((r) => r.name === name.trim());
    return { name: name.trim(), permissions: role?.permissions ?? [], created };
  }

  /**
   * Grant a role to a principal; idempotent
   */
  @Post('principals/:id/roles')
  @RequirePermission('role:assign')
  async assign(
    @Param('id') id: string,
    @Body() dto: AssignRoleDto,
    @Req() req: CatalogRequest
  ): Promise<{ principalId: string; role: string; assigned: boolean }> {
    if (!this.directory.has(id)) throw new NotFoundException();
    const assigned = await this.permissions.assignRole(id, dto.role, actionContext(req));
    return { principalId: id, role: dto.role, assigned };
  }
}
