// Import validation decorators
import { IsOptional, IsString, MaxLength } from 'class-validator';
// Import Swagger property metadata
import { ApiPropertyOptional } from '@nestjs/swagger';

/**
 * FeedbackInputDto - Raw contact form fields
 */
export class FeedbackInputDto {
  @ApiPropertyOptional({ example: 'Ada' })
  @IsOptional()
  @IsString()
  @MaxLength(10_000)
  name?: string;

  @ApiPropertyOptional({ example: 'reader@example.test' })
  @IsOptional()
  @IsString()
  @MaxLength(10_000)
  email?: string;

  @ApiPropertyOptional({ example: 'Please add more security titles.' })
  @IsOptional()
  @IsString()
  @MaxLength(10_000)
  message?: string;
}
