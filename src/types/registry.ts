export interface DependencyRecord {
  readonly name: string;
  readonly version: string;
  readonly integrityHash?: string;
}

/** Record as supplied by a table or caller; a null hash means none. */
export interface DependencyInput {
  readonly name: string;
  readonly version: string;
  readonly integrityHash?: string | null;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
