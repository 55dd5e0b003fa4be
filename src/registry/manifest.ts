import { Architecture, DigestEntry, ImageRef, ResolvedManifest } from '../types';

/**
 * Build a new resolved manifest for ref; the input is never modified
 */
export function withDigests(ref: ImageRef, digests: readonly DigestEntry[]): ResolvedManifest {
  return Object.freeze({
    registry: ref.registry,
    repository: ref.repository,
    tag: ref.tag,
    digests: Object.freeze(digests.map((entry) => Object.freeze({ ...entry }))),
  });
}

/**
 * `architecture` or `architecture/variant`
 */
export function platformKey(entry: Pick<DigestEntry, 'architecture' | 'variant'>): string {
  return entry.variant ? `${entry.architecture}/${entry.variant}` : entry.architecture;
}

/**
 * Keep the first entry per platform
 */
export function dedupeByPlatform(entries: readonly DigestEntry[]): DigestEntry[] {
  const seen = new Set<string>();
  const result: DigestEntry[] = [];
  for (const entry of entries) {
    const key = platformKey(entry);
    if (!seen.has(key)) {
      seen.add(key);
      result.push(entry);
    }
  }
  return result;
}

/**
 * Keep the first entry per architecture, whatever its variant
 */
export function dedupeByArchitecture(entries: readonly DigestEntry[]): DigestEntry[] {
  const seen = new Set<string>();
  return entries.filter((entry) => {
    if (seen.has(entry.architecture)) {
      return false;
    }
    seen.add(entry.architecture);
    return true;
  });
}

/**
 * `arm64` matches every arm64 variant, `arm64/v8` only the v8 variant
 */
export function matchesArchitecture(entry: DigestEntry, architecture: Architecture): boolean {
  const slash = architecture.indexOf('/');
  if (slash === -1) {
    return entry.architecture === architecture;
  }
  return (
    entry.architecture === architecture.slice(0, slash) &&
    entry.variant === architecture.slice(slash + 1)
  );
}

/**
 * Entries whose platform is in the allow-list, in their original order
 */
export function filterByArchitecture(
  entries: readonly DigestEntry[],
  architectures: readonly Architecture[]
): DigestEntry[] {
  return entries.filter((entry) => architectures.some((arch) => matchesArchitecture(entry, arch)));
}
