import type { DependencyInput } from '../types/registry.js';
import type {
  ValidateOptions,
  ValidationIssue,
  ValidationResult,
} from '../types/validation.js';
import { isWellFormedIntegrity } from '../utils/integrity.js';

export class ValidationError extends Error {
  constructor(public readonly issues: ValidationIssue[]) {
    const offending = offendingRecords(issues);
    super(
      `Dependency table is invalid (${offending.length} offending record(s): ${offending.join(', ')}):\n` +
        issues.map((i) => `  - ${i.message}`).join('\n'),
    );
    this.name = 'ValidationError';
  }

  /** Names of the records that failed, in report order. */
  get records(): string[] {
    return offendingRecords(this.issues);
  }
}

function offendingRecords(issues: ValidationIssue[]): string[] {
  const names = new Set<string>();
  for (const issue of issues) {
    if (issue.severity === 'error' && issue.record !== undefined) {
      names.add(issue.record);
    }
  }
  return [...names];
}

function requiresIntegrity(
  name: string,
  requireIntegrity: ValidateOptions['requireIntegrity'],
): boolean {
  if (requireIntegrity === undefined || requireIntegrity === false) return false;
  if (requireIntegrity === true) return true;
  return requireIntegrity.includes(name);
}

/**
 * Check the structural invariants of a record list. Every violation is
 * reported; the result is valid when no issue has severity "error".
 */
export function validateRecords(
  records: Iterable<DependencyInput>,
  options: ValidateOptions = {},
): ValidationResult {
  const issues: ValidationIssue[] = [];
  const seen = new Map<string, number[]>();

  let index = 0;
  for (const record of records) {
    const path = `dependencies[${index}]`;
    const label = record.name.trim() === '' ? `#${index}` : `"${record.name}"`;

    if (record.name.trim() === '') {
      issues.push({
        severity: 'error',
        code: 'EMPTY_NAME',
        message: `Dependency ${label} has an empty name`,
        path: `${path}.name`,
        record: record.name,
      });
    } else {
      const indices = seen.get(record.name) ?? [];
      indices.push(index);
      seen.set(record.name, indices);
    }

    if (record.version.trim() === '') {
      issues.push({
        severity: 'error',
        code: 'EMPTY_VERSION',
        message: `Dependency ${label} has an empty version`,
        path: `${path}.version`,
        record: record.name,
      });
    } else if (/[\s"'\\]/.test(record.version)) {
      issues.push({
        severity: 'error',
        code: 'MALFORMED_VERSION',
        message: `Dependency ${label} has a malformed version "${record.version}"`,
        path: `${path}.version`,
        record: record.name,
      });
    }

    if (record.integrityHash === undefined || record.integrityHash === null) {
      if (requiresIntegrity(record.name, options.requireIntegrity)) {
        issues.push({
          severity: 'error',
          code: 'MISSING_INTEGRITY',
          message: `Dependency ${label} is pinned to ${record.version} without an integrity hash`,
          path: `${path}.integrityHash`,
          record: record.name,
        });
      }
    } else if (record.integrityHash.trim() === '') {
      issues.push({
        severity: 'error',
        code: 'EMPTY_INTEGRITY',
        message: `Dependency ${label} has an empty integrity hash`,
        path: `${path}.integrityHash`,
        record: record.name,
      });
    } else if (options.strictIntegrity && !isWellFormedIntegrity(record.integrityHash)) {
      issues.push({
        severity: 'error',
        code: 'MALFORMED_INTEGRITY',
        message: `Dependency ${label} has a malformed integrity hash "${record.integrityHash}"`,
        path: `${path}.integrityHash`,
        record: record.name,
      });
    }

    index++;
  }

  for (const [name, indices] of seen) {
    if (indices.length > 1) {
      issues.push({
        severity: 'error',
        code: 'DUPLICATE_NAME',
        message: `Dependency "${name}" is declared ${indices.length} times (entries ${indices.join(', ')})`,
        path: `dependencies[${indices[1]}].name`,
        record: name,
      });
    }
  }

  const required = options.requireIntegrity;
  if (required !== undefined && typeof required !== 'boolean') {
    for (const name of required) {
      if (!seen.has(name)) {
        issues.push({
          severity: 'warning',
          code: 'UNKNOWN_REQUIRED_NAME',
          message: `Integrity is required for "${name}", which is not in the table`,
        });
      }
    }
  }

  return {
    valid: issues.every((i) => i.severity !== 'error'),
    issues,
  };
}
