export { dependencyTableSchema } from './schema.js';
export { validateTable, isDependencyTable } from './validate.js';
export type { DependencyEntry, DependencyTable } from './table.js';
export type { TableSchemaError, TableValidationResult } from './validation.js';
