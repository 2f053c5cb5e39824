export interface DependencyEntry {
  /** Logical dependency name, e.g. "rules_go". */
  name: string;
  /** Version string. Never parsed; compared byte for byte. */
  version: string;
  /** `<algorithm>:<digest>`, e.g. "sha256:29218f8e...". Null means unpinned. */
  integrityHash?: string | null;
}

export interface DependencyTable {
  dependencies: DependencyEntry[];
}
