import type { DependencyTable } from './table.js';

export interface TableSchemaError {
  /** JSON pointer into the table, "/" for the root. */
  path: string;
  message: string;
}

export type TableValidationResult =
  | { valid: true; table: DependencyTable; errors: [] }
  | { valid: false; errors: TableSchemaError[] };
