import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import JSON5 from 'json5';
import { validateTable, type TableSchemaError } from '@pinset/schema';
import type { DependencyRecord } from '../types/registry.js';
import { getDefaultTablePath } from '../utils/paths.js';
import { VersionRegistry, toDependencyRecord } from './registry.js';
import { parseStarlarkVersions, StarlarkParseError } from './starlark.js';

export type TableFormat = 'json5' | 'starlark';

export interface LoadTableOptions {
  /** Overrides the format inferred from the file extension. */
  format?: TableFormat;
}

export class TableLoadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
    public readonly schemaErrors: TableSchemaError[] = [],
  ) {
    super(message);
    this.name = 'TableLoadError';
  }
}

const EXTENSION_FORMATS: Record<string, TableFormat> = {
  '.json': 'json5',
  '.json5': 'json5',
  '.bzl': 'starlark',
  '.star': 'starlark',
};

export function detectTableFormat(path: string): TableFormat {
  const format = EXTENSION_FORMATS[extname(path).toLowerCase()];
  if (!format) {
    throw new TableLoadError(
      `Cannot infer table format from "${path}" (expected .json, .json5, .bzl or .star)`,
      path,
    );
  }
  return format;
}

/**
 * Parse table source text. `path` is only used in error messages.
 */
export function parseTable(
  raw: string,
  format: TableFormat,
  path: string,
): DependencyRecord[] {
  if (format === 'starlark') {
    try {
      return parseStarlarkVersions(raw).records;
    } catch (err) {
      if (err instanceof StarlarkParseError) {
        throw new TableLoadError(`Invalid Starlark in ${path}: ${err.message}`, path, err);
      }
      throw err;
    }
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new TableLoadError(`Invalid JSON5 in ${path}`, path, err);
  }

  const result = validateTable(parsed);
  if (!result.valid) {
    const details = result.errors.map((e) => `${e.path} ${e.message}`).join('; ');
    throw new TableLoadError(
      `Dependency table ${path} does not match the schema: ${details}`,
      path,
      undefined,
      result.errors,
    );
  }

  return result.table.dependencies.map(toDependencyRecord);
}

export async function loadTable(
  path: string,
  options: LoadTableOptions = {},
): Promise<DependencyRecord[]> {
  const format = options.format ?? detectTableFormat(path);

  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new TableLoadError(`Cannot read dependency table: ${path}`, path, err);
  }

  return parseTable(raw, format, path);
}

export async function loadRegistry(
  path: string,
  options: LoadTableOptions = {},
): Promise<VersionRegistry> {
  return VersionRegistry.from(await loadTable(path, options));
}

/** The table bundled with the package under data/versions.json5. */
export async function loadDefaultRegistry(): Promise<VersionRegistry> {
  return loadRegistry(getDefaultTablePath());
}
