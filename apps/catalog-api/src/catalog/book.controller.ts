// Import NestJS controller decorators
import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Put, Req } from '@nestjs/common';
// Import Swagger decorators for API documentation
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
// Import operation result unwrapping
import { unwrapOperation } from '../common/http/operation-response';
// Import request helpers
import { type CatalogRequest, extractBearerToken } from '../common/request/request-context';
// Import DTO
import { BookInputDto } from './dto/book-input.dto';
// Import the gated operation service
import { CatalogOperationService } from './catalog-operation.service';
import type { OperationPayload } from './catalog-operation.types';

/**
 * BookController - REST API for the book catalog
 * Routes: /books
 *
 * Authorization and input cleaning happen in CatalogOperationService;
 * this controller only maps HTTP onto operations and results onto responses.
 */
@ApiTags('books')
@ApiBearerAuth('bearer')
@Controller('books')
export class BookController {
  constructor(private readonly operations: CatalogOperationService) {}

  @Get()
  async list(@Req() req: CatalogRequest): Promise<OperationPayload> {
    return unwrapOperation(await this.operations.performOperation(extractBearerToken(req), 'list'));
  }

  @Get(':id')
  async view(@Param('id') id: string, @Req() req: CatalogRequest): Promise<OperationPayload> {
    return unwrapOperation(await this.operations.performOperation(extractBearerToken(req), 'view', id));
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(@Body() dto: BookInputDto, @Req() req: CatalogRequest): Promise<OperationPayload> {
    return unwrapOperation(
      await this.operations.performOperation(extractBearerToken(req), 'create', undefined, { ...dto })
    );
  }

  @Put(':id')
  async update(
    @Param('id') id: string,
    @Body() dto: BookInputDto,
    @Req() req: CatalogRequest
  ): Promise<OperationPayload> {
    return unwrapOperation(await this.operations.performOperation(extractBearerToken(req), 'update', id, { ...dto }));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id') id: string, @Req() req: CatalogRequest): Promise<void> {
    unwrapOperation(await this.operations.performOperation(extractBearerToken(req), 'delete', id));
  }
}
