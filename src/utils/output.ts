import chalk from 'chalk';
import { VersionRegistry } from '../core/registry.js';
import type { DependencyRecord } from '../types/registry.js';
import type { ValidationIssue, ValidationResult } from '../types/validation.js';

export const icons = {
  success: chalk.green('✔'),
  error: chalk.red('✖'),
  warning: chalk.yellow('⚠'),
  info: chalk.blue('ℹ'),
};

export function table(rows: string[][], columnGap = 2): string {
  if (rows.length === 0) return '';

  const colCount = Math.max(...rows.map((r) => r.length));
  const widths: number[] = [];

  for (let c = 0; c < colCount; c++) {
    widths[c] = Math.max(...rows.map((r) => (r[c] ?? '').length));
  }

  return rows
    .map((row) =>
      row
        .map((cell, i) =>
          i < row.length - 1 ? cell.padEnd(widths[i] + columnGap) : cell,
        )
        .join(''),
    )
    .join('\n');
}

/** Plain-text listing of a registry, one record per row. */
export function formatRegistry(source: VersionRegistry | Iterable<DependencyRecord>): string {
  const records = source instanceof VersionRegistry ? source.all() : source;
  const rows = [['NAME', 'VERSION', 'INTEGRITY']];
  for (const record of records) {
    rows.push([record.name, record.version, record.integrityHash ?? '-']);
  }
  return table(rows);
}

function severityIcon(severity: ValidationIssue['severity']): string {
  switch (severity) {
    case 'error':
      return icons.error;
    case 'warning':
      return icons.warning;
    case 'info':
      return icons.info;
  }
}

export function formatValidationReport(result: ValidationResult): string {
  let headline: string;
  if (result.valid && result.issues.length === 0) {
    headline = `${icons.success} Dependency table is valid`;
  } else if (result.valid) {
    headline = `${icons.success} Dependency table is valid (with warnings)`;
  } else {
    headline = `${icons.error} Dependency table has validation errors`;
  }

  const lines = [headline];
  for (const issue of result.issues) {
    const pathStr = issue.path ? ` (${issue.path})` : '';
    lines.push(`  ${severityIcon(issue.severity)} ${issue.message}${pathStr}`);
  }
  return lines.join('\n');
}

export interface ReportOptions {
  quiet?: boolean;
  json?: boolean;
}

export function reportValidation(result: ValidationResult, options: ReportOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (options.quiet) return;

  console.log(formatValidationReport(result));
}
