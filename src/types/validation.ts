export type IssueSeverity = 'error' | 'warning' | 'info';

export interface ValidationIssue {
  severity: IssueSeverity;
  code: string;
  message: string;
  path?: string;
  /** Name of the offending record, when the issue concerns one. */
  record?: string;
}

export interface ValidationResult {
  valid: boolean;
  issues: ValidationIssue[];
}

export interface ValidateOptions {
  /**
   * Which records must carry an integrity hash: none (false), every record
   * (true), or the named ones.
   */
  requireIntegrity?: boolean | readonly string[];
  /** Reject hashes that are not `<algorithm>:<digest>` with a known algorithm. */
  strictIntegrity?: boolean;
}
