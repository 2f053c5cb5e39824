import type { DependencyInput, DependencyRecord, Result } from '../types/registry.js';
import type { ValidateOptions } from '../types/validation.js';
import { validateRecords, ValidationError } from './structural-validator.js';

export class NotFoundError extends Error {
  constructor(public readonly dependencyName: string) {
    super(`Dependency "${dependencyName}" not found in registry`);
    this.name = 'NotFoundError';
  }
}

/** Frozen copy of the record, with a null hash dropped. */
export function toDependencyRecord(record: DependencyInput): DependencyRecord {
  return Object.freeze(
    record.integrityHash === undefined || record.integrityHash === null
      ? { name: record.name, version: record.version }
      : { name: record.name, version: record.version, integrityHash: record.integrityHash },
  );
}

/**
 * Read-only table of pinned dependency versions. Built once from the loaded
 * table and handed to whatever needs to look versions up.
 */
export class VersionRegistry {
  private readonly records: readonly DependencyRecord[];
  private readonly byName: ReadonlyMap<string, DependencyRecord>;

  private constructor(records: readonly DependencyRecord[]) {
    this.records = records;

    const byName = new Map<string, DependencyRecord>();
    for (const record of records) {
      // A duplicated name resolves to its first entry; validate() reports the rest.
      if (!byName.has(record.name)) byName.set(record.name, record);
    }
    this.byName = byName;
  }

  static from(records: Iterable<DependencyInput>): VersionRegistry {
    return new VersionRegistry(Object.freeze([...records].map(toDependencyRecord)));
  }

  get size(): number {
    return this.records.length;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): DependencyRecord {
    const record = this.byName.get(name);
    if (!record) {
      throw new NotFoundError(name);
    }
    return record;
  }

  /** Every record in load order. Each iteration starts from the beginning. */
  all(): Iterable<DependencyRecord> {
    const records = this.records;
    return {
      *[Symbol.iterator]() {
        yield* records;
      },
    };
  }

  /** Distinct names in first-seen order. */
  names(): string[] {
    return [...this.byName.keys()];
  }

  validate(options?: ValidateOptions): Result<void, ValidationError> {
    const result = validateRecords(this.records, options);
    if (result.valid) {
      return { ok: true, value: undefined };
    }
    return {
      ok: false,
      error: new ValidationError(result.issues.filter((i) => i.severity === 'error')),
    };
  }

  assertValid(options?: ValidateOptions): void {
    const result = this.validate(options);
    if (!result.ok) {
      throw result.error;
    }
  }
}

export function createRegistry(records: Iterable<DependencyInput>): VersionRegistry {
  return VersionRegistry.from(records);
}
