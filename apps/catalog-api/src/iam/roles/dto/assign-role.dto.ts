// Import validation decorators
import { IsString, MaxLength, MinLength } from 'class-validator';
// Import Swagger property metadata
import { ApiProperty } from '@nestjs/swagger';

/**
 * AssignRoleDto - Role to grant to a principal
 */
export class AssignRoleDto {
  @ApiProperty({ example: 'Editors' })
  @IsString()
  @MinLength(1)
  @MaxLength(64)
  role!: string;
}
