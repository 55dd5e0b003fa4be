import { DigestEntry, ResolvedManifest } from '../types';

/**
 * Source digests the destination does not hold yet, sorted
 */
export function missingDigests(
  source: readonly DigestEntry[],
  destination: readonly DigestEntry[]
): string[] {
  const present = new Set(destination.map((entry) => entry.digest));
  const missing = new Set(source.map((entry) => entry.digest).filter((digest) => !present.has(digest)));
  return [...missing].sort();
}

/**
 * Same digest set, order-independent
 */
export function sameDigests(a: readonly DigestEntry[], b: readonly DigestEntry[]): boolean {
  const left = new Set(a.map((entry) => entry.digest));
  const right = new Set(b.map((entry) => entry.digest));
  if (left.size !== right.size) {
    return false;
  }
  for (const digest of left) {
    if (!right.has(digest)) {
      return false;
    }
  }
  return true;
}

/**
 * Order images by registry, repository, then tag
 */
export function compareImages(a: ResolvedManifest, b: ResolvedManifest): number {
  return (
    compareStrings(a.registry, b.registry) ||
    compareStrings(a.repository, b.repository) ||
    compareStrings(a.tag, b.tag)
  );
}

function compareStrings(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
