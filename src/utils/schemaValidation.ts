import { Ajv } from 'ajv';
import type { ErrorObject, Schema } from 'ajv';

const ajv = new Ajv({ allErrors: true, strict: false });

export interface SchemaValidationResult<T> {
  valid: boolean;
  value?: T;
  errors: string[];
  errorDetails: { path: string; message: string }[];
}

export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): { path: string; message: string }[] {
  return (errors || []).map(err => ({ path: err.instancePath || '(root)', message: err.message || '' }));
}

/**
 * Compiles a JSON schema once and returns a checker that narrows unknown
 * input to `T` or reports every violation with its path.
 */
export function createValidator<T>(schema: Schema): (data: unknown) => SchemaValidationResult<T> {
  const validator = ajv.compile<T>(schema);
  return (data: unknown) => {
    if (validator(data)) {
      return { valid: true, value: data, errors: [], errorDetails: [] };
    }
    const errorDetails = formatSchemaErrors(validator.errors);
    const errors = errorDetails.map(detail => `${detail.path} ${detail.message}`.trim());
    return { valid: false, errors, errorDetails };
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
