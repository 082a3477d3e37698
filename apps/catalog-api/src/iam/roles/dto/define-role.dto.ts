// Import validation decorators
import { ArrayMaxSize, ArrayUnique, IsArray, IsString, MaxLength } from 'class-validator';
// Import Swagger property metadata
import { ApiProperty } from '@nestjs/swagger';

/**
 * DefineRoleDto - Full permission set of a role
 * This is a full replacement operation, not an additive update
 */
export class DefineRoleDto {
  /** Permission keys ('resource:action'); every key must be known */
  @ApiProperty({ example: ['book:view', 'book:create'] })
  @IsArray()
  @ArrayUnique() // Ensure no duplicate permission keys
  @ArrayMaxSize(200)
  @IsString({ each: true })
  @MaxLength(128, { each: true })
  permissions!: string[];
}
