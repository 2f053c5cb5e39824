import type { DependencyRecord } from '../types/registry.js';
import { icons } from '../utils/output.js';
import { INTEGRITY_ALGORITHMS, splitIntegrity } from '../utils/integrity.js';

export class StarlarkParseError extends Error {
  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(`line ${line}: ${message}`);
    this.name = 'StarlarkParseError';
  }
}

export class StarlarkRenderError extends Error {
  constructor(
    message: string,
    public readonly dependencyName: string,
  ) {
    super(message);
    this.name = 'StarlarkRenderError';
  }
}

export interface StarlarkVersions {
  /** Name of the variable the struct is assigned to. */
  variable: string;
  records: DependencyRecord[];
}

export interface RenderOptions {
  variable?: string;
  indent?: string;
}

const OPEN_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*struct\s*\(\s*(?:#.*)?$/;
const ENTRY_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*"((?:[^"\\]|\\.)*)"\s*,?\s*(?:#.*)?$/;
const KEY_PATTERN = new RegExp(
  `^(.+)_(VERSION|${INTEGRITY_ALGORITHMS.map((a) => a.toUpperCase()).join('|')})$`,
);

interface PendingRecord {
  name: string;
  version: string;
  integrityHash?: string;
}

function unquote(raw: string, line: number): string {
  try {
    const value: unknown = JSON.parse(`"${raw}"`);
    if (typeof value === 'string') return value;
  } catch (err) {
    throw new StarlarkParseError(
      `Unsupported escape in string "${raw}" (${err instanceof Error ? err.message : String(err)})`,
      line,
    );
  }
  throw new StarlarkParseError(`Unsupported string "${raw}"`, line);
}

/**
 * Parse a `versions = struct(NAME_VERSION = "...", NAME_SHA256 = "...")` file.
 * Record names are the key prefixes in lower case; hashes are stored as
 * `<algorithm>:<digest>`.
 */
export function parseStarlarkVersions(source: string): StarlarkVersions {
  const lines = source.split(/\r?\n/);
  const pending = new Map<string, PendingRecord>();
  const keys = new Set<string>();

  let variable: string | null = null;
  let closed = false;

  for (const [i, rawLine] of lines.entries()) {
    const lineNo = i + 1;
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) continue;

    if (variable === null) {
      const open = OPEN_PATTERN.exec(line);
      if (!open) {
        throw new StarlarkParseError(`Expected "<name> = struct(", got "${line}"`, lineNo);
      }
      variable = open[1];
      continue;
    }

    if (closed) {
      throw new StarlarkParseError(`Unexpected content after struct: "${line}"`, lineNo);
    }

    if (/^\)\s*(?:#.*)?$/.test(line)) {
      closed = true;
      continue;
    }

    const entry = ENTRY_PATTERN.exec(line);
    if (!entry) {
      throw new StarlarkParseError(`Expected KEY = "value", got "${line}"`, lineNo);
    }

    const key = entry[1].toUpperCase();
    const value = unquote(entry[2], lineNo);
    if (keys.has(key)) {
      throw new StarlarkParseError(`Key ${key} is repeated`, lineNo);
    }
    keys.add(key);

    const parts = KEY_PATTERN.exec(key);
    if (!parts) {
      console.warn(`${icons.warning} Ignoring unrecognized key ${key} on line ${lineNo}`);
      continue;
    }

    const name = parts[1].toLowerCase();
    const suffix = parts[2];
    if (suffix === 'VERSION') {
      pending.set(name, { name, version: value });
      continue;
    }

    const record = pending.get(name);
    if (!record) {
      throw new StarlarkParseError(`${key} has no preceding ${parts[1]}_VERSION`, lineNo);
    }
    if (record.integrityHash !== undefined) {
      throw new StarlarkParseError(
        `${key} gives ${parts[1]} a second hash (already ${record.integrityHash})`,
        lineNo,
      );
    }
    record.integrityHash = `${suffix.toLowerCase()}:${value}`;
  }

  if (variable === null) {
    throw new StarlarkParseError('No struct( found', lines.length);
  }
  if (!closed) {
    throw new StarlarkParseError('Unterminated struct(', lines.length);
  }

  return { variable, records: [...pending.values()] };
}

// Names must survive the upper-casing of keys and the lower-casing on parse.
const RENDERABLE_NAME = /^[a-z_][a-z0-9_]*$/;

export function renderStarlarkVersions(
  records: Iterable<DependencyRecord>,
  options: RenderOptions = {},
): string {
  const variable = options.variable ?? 'versions';
  const indent = options.indent ?? '    ';

  const groups: string[][] = [];
  const rendered = new Set<string>();
  for (const record of records) {
    if (!RENDERABLE_NAME.test(record.name)) {
      throw new StarlarkRenderError(
        `Cannot render "${record.name}": names must match ${RENDERABLE_NAME.source}`,
        record.name,
      );
    }
    if (rendered.has(record.name)) {
      throw new StarlarkRenderError(`Cannot render "${record.name}" twice`, record.name);
    }
    rendered.add(record.name);

    const key = record.name.toUpperCase();
    const group = [
      `${indent}# ${record.name}`,
      `${indent}${key}_VERSION = ${JSON.stringify(record.version)},`,
    ];

    if (record.integrityHash !== undefined) {
      const parts = splitIntegrity(record.integrityHash);
      const suffix = parts ? parts.algorithm.toUpperCase() : 'SHA256';
      const digest = parts ? parts.digest : record.integrityHash;
      group.push(`${indent}${key}_${suffix} = ${JSON.stringify(digest)},`);
    }
    groups.push(group);
  }

  const body = groups.map((g) => g.join('\n')).join('\n\n');
  return `${variable} = struct(\n${body}${body ? '\n' : ''})\n`;
}
