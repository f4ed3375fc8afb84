import { BadRequestException } from '@nestjs/common';
import { plainToInstance, ClassConstructor } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';

/**
 * Flattens nested class-validator errors into "property: message" lines.
 */
export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap(error => {
    const path = parentPath
      ? `${parentPath}.${error.property}`
      : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      message => `${path}: ${message}`,
    );
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

/**
 * Converts `input` to an instance of `dtoClass` and validates it.
 * Throws BadRequestException listing every failed constraint.
 */
export async function assertValid<T extends object>(
  dtoClass: ClassConstructor<T>,
  input: object,
): Promise<T> {
  const dto = plainToInstance(dtoClass, input);
  const errors = await validate(dto, {
    whitelist: true,
    forbidNonWhitelisted: true,
  });

  if (errors.length > 0) {
    throw new BadRequestException({
      message: 'Validation failed',
      errors: flattenValidationErrors(errors),
    });
  }

  return dto;
}
