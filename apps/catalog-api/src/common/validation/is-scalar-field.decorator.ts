// Import class-validator's custom decorator builder
import { ValidateBy, type ValidationOptions } from 'class-validator';

/**
 * Accept a string or a finite number, nothing else
 * Raw form fields are left for the sanitizing validator to clean and judge
 */
export function IsScalarField(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isScalarField',
      validator: {
        validate: (value: unknown) => typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value)),
        defaultMessage: () => '$property must be a string or a number'
      }
    },
    validationOptions
  );
}
