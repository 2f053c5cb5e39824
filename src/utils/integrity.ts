export const INTEGRITY_ALGORITHMS = ['sha256', 'sha384', 'sha512'] as const;

export type IntegrityAlgorithm = (typeof INTEGRITY_ALGORITHMS)[number];

/** Digest size in bytes per supported algorithm. */
const DIGEST_BYTES: Record<IntegrityAlgorithm, number> = {
  sha256: 32,
  sha384: 48,
  sha512: 64,
};

export interface IntegrityParts {
  algorithm: IntegrityAlgorithm;
  digest: string;
}

export function isIntegrityAlgorithm(s: string): s is IntegrityAlgorithm {
  return Object.hasOwn(DIGEST_BYTES, s);
}

/**
 * Split `sha256:<digest>` (or the SRI form `sha256-<digest>`) into its parts.
 * Returns null when there is no known algorithm prefix. The digest is not checked.
 */
export function splitIntegrity(hash: string): IntegrityParts | null {
  const match = /^([a-z0-9]+)[:-](.+)$/i.exec(hash);
  if (!match) return null;

  const algorithm = match[1].toLowerCase();
  if (!isIntegrityAlgorithm(algorithm)) return null;
  return { algorithm, digest: match[2] };
}

/** True when the digest is hex or padded base64 of the algorithm's exact size. */
export function isWellFormedIntegrity(hash: string): boolean {
  const parts = splitIntegrity(hash);
  if (!parts) return false;

  const bytes = DIGEST_BYTES[parts.algorithm];
  const { digest } = parts;

  if (/^[0-9a-f]+$/i.test(digest) && digest.length === bytes * 2) {
    return true;
  }
  return /^[A-Za-z0-9+/]+={0,2}$/.test(digest) && digest.length === Math.ceil(bytes / 3) * 4;
}
