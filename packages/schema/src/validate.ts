import Ajv2020 from 'ajv/dist/2020.js';
import type { ValidateFunction } from 'ajv';
import { dependencyTableSchema } from './schema.js';
import type { DependencyTable } from './table.js';
import type { TableValidationResult } from './validation.js';

let validateFn: ValidateFunction<DependencyTable> | null = null;

function getValidator(): ValidateFunction<DependencyTable> {
  if (validateFn) return validateFn;

  const ajv = new Ajv2020.default({ allErrors: true, strict: false });
  validateFn = ajv.compile<DependencyTable>(dependencyTableSchema);
  return validateFn;
}

export function isDependencyTable(data: unknown): data is DependencyTable {
  return getValidator()(data);
}

export function validateTable(data: unknown): TableValidationResult {
  const validate = getValidator();
  if (validate(data)) {
    return { valid: true, table: data, errors: [] };
  }

  const errors = (validate.errors ?? []).map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'unknown error',
  }));

  return { valid: false, errors };
}
