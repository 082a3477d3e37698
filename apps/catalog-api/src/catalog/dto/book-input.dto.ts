// Import validation decorators
import { IsOptional, IsString, MaxLength } from 'class-validator';
// Import Swagger property metadata
import { ApiPropertyOptional } from '@nestjs/swagger';
// Import scalar field check
import { IsScalarField } from '../../common/validation/is-scalar-field.decorator';

/**
 * BookInputDto - Raw book fields for create and full update
 * Only the shape is checked here; content is cleaned and judged by the sanitizing validator
 */
export class BookInputDto {
  /** Book title, markup is stripped */
  @ApiPropertyOptional({ example: 'Secure Web Application Patterns' })
  @IsOptional()
  @IsString()
  @MaxLength(10_000)
  title?: string;

  /** Author name, markup is stripped */
  @ApiPropertyOptional({ example: 'Security Expert' })
  @IsOptional()
  @IsString()
  @MaxLength(10_000)
  author?: string;

  /** Whole number between 1000 and the configured maximum */
  @ApiPropertyOptional({ example: 2023, oneOf: [{ type: 'integer' }, { type: 'string' }] })
  @IsOptional()
  @IsScalarField()
  publicationYear?: string | number;
}
