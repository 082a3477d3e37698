// Import NestJS ValidationPipe
import { ValidationPipe } from '@nestjs/common';
// Import class-validator's error shape
import type { ValidationError as ClassValidatorError } from 'class-validator';
// Import the catalog's validation error
import { type FieldViolation, ValidationError } from '../errors/catalog-errors';

/**
 * Flatten class-validator errors into field violations
 * Nested properties are reported with a dotted path ('address.city')
 */
export function toFieldViolations(errors: readonly ClassValidatorError[], parentPath = ''): FieldViolation[] {
  const violations: FieldViolation[] = [];
  for (const error of errors) {
    const field = parentPath ? `${parentPath}.${error.property}` : error.property;
    for (const message of Object.values(error.constraints ?? {})) {
      violations.push({ field, message });
    }
    if (error.children && error.children.length > 0) {
      violations.push(...toFieldViolations(error.children, field));
    }
  }
  return violations;
}

/**
 * Global DTO validation pipe
 * Unknown properties are rejected; failures surface as ValidationError so the
 * error filter reports them the same way as sanitizer violations
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true, // Strip properties that don't have decorators in the DTO
    forbidNonWhitelisted: true, // Reject unknown properties instead of silently dropping them
    transform: true, // Transform payloads to DTO instances
    exceptionFactory: (errors) => new ValidationError(toFieldViolations(errors))
  });
}
