/**
 * Validation utilities using TypeBox.
 */

import type { TSchema } from 'typebox';
import { Compile } from 'typebox/compile';
import { ValidationError } from './errors.ts';
import type { JSONSchema } from './types.ts';

/**
 * Compiled validator for a schema.
 */
export interface CompiledValidator<T> {
  /** Check if value is valid */
  check: (value: unknown) => value is T;
  /** Validate and throw on error */
  validate: (value: unknown) => T;
}

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  keyword: string;
  schemaPath: string;
  instancePath: string;
  params: object;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Compile a JSON Schema into a validator.
 */
export function compileSchema<T>(schema: JSONSchema): CompiledValidator<T> {
  // TypeBox accepts plain JSON Schema objects.
  const compiled = Compile(schema as TSchema);

  const check = (value: unknown): value is T => compiled.Check(value);

  return {
    check,
    validate: (value: unknown): T => {
      if (!check(value)) {
        throw new ValidationError(formatErrors(compiled.Errors(value)));
      }
      return value;
    },
  };
}
