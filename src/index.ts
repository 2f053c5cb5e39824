export {
  VersionRegistry,
  NotFoundError,
  createRegistry,
  toDependencyRecord,
} from './core/registry.js';
export { validateRecords, ValidationError } from './core/structural-validator.js';
export {
  loadTable,
  loadRegistry,
  loadDefaultRegistry,
  parseTable,
  detectTableFormat,
  TableLoadError,
} from './core/table-loader.js';
export type { TableFormat, LoadTableOptions } from './core/table-loader.js';
export {
  parseStarlarkVersions,
  renderStarlarkVersions,
  StarlarkParseError,
  StarlarkRenderError,
} from './core/starlark.js';
export type { StarlarkVersions, RenderOptions } from './core/starlark.js';
export {
  splitIntegrity,
  isWellFormedIntegrity,
  INTEGRITY_ALGORITHMS,
} from './utils/integrity.js';
export type { IntegrityAlgorithm, IntegrityParts } from './utils/integrity.js';
export { formatRegistry, formatValidationReport, reportValidation } from './utils/output.js';
export type { ReportOptions } from './utils/output.js';
export type { DependencyInput, DependencyRecord, Result } from './types/registry.js';
export type {
  ValidateOptions,
  ValidationIssue,
  ValidationResult,
  IssueSeverity,
} from './types/validation.js';
