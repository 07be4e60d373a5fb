import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';

/**
 * JSON Schema Validator
 *
 * Compiled ajv guards for model output documents and configuration files.
 */

const ajv = new Ajv({
  allErrors: true,
  strict: false, // Allow additional properties and unknown keywords
});

/**
 * Validation Result
 */
export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ErrorObject[] };

/**
 * Validator wrapping the shared ajv instance
 */
export class SchemaValidator {
  /**
   * Compile a schema into a type guard for T
   */
  compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
    return ajv.compile<T>(schema);
  }

  /**
   * Run a compiled guard and keep its errors
   */
  validate<T>(guard: ValidateFunction<T>, data: unknown): ValidationResult<T> {
    if (guard(data)) {
      return { valid: true, data };
    }
    return { valid: false, errors: guard.errors ?? [] };
  }

  /**
   * Format validation errors as a readable string
   */
  formatErrors(errors?: ErrorObject[]): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        return `${path}: ${message}`;
      })
      .join('; ');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();
