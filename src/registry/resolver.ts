import {
  Architecture,
  DigestEntry,
  ImageRef,
  MEDIA_TYPES,
  ManifestMediaType,
  ProtocolError,
  RegistryApiResponse,
  RegistryChallenge,
  ResolvedManifest,
} from '../types';
import { Logger } from '../logger';
import { HttpClient, parseJson } from '../utils/api';
import { formatImageRef, normalizeRegistryHost, registryApiUrl } from '../utils/validation';
import { ChallengeCache, scopedParams } from './challenge';
import { dedupeByArchitecture, dedupeByPlatform, filterByArchitecture, withDigests } from './manifest';
import {
  imageConfigSchema,
  imageManifestSchema,
  manifestListSchema,
  tokenResponseSchema,
} from './schemas';

/**
 * Lists first; some registries answer with a single manifest regardless,
 * so the response Content-Type decides how the body is read.
 */
export const MANIFEST_ACCEPT = [
  MEDIA_TYPES.DOCKER_MANIFEST_LIST,
  MEDIA_TYPES.OCI_INDEX,
  `${MEDIA_TYPES.DOCKER_MANIFEST};q=0.9`,
].join(', ');

export function isManifestMediaType(value: string): value is ManifestMediaType {
  return Object.values(MEDIA_TYPES).some((mediaType) => mediaType === value);
}

/**
 * Resolves tags to the digests of their platform variants.
 *
 * Every resolution goes to the network: anonymous token for the repository,
 * manifest by tag, and the config blob when the registry only serves a
 * single-platform manifest. Only the auth challenge is cached.
 */
export class ManifestResolver {
  private readonly logger: Logger;
  private readonly httpClient: HttpClient;
  private readonly challenges: ChallengeCache;
  private readonly architectures: readonly Architecture[];

  constructor(
    logger: Logger,
    httpClient: HttpClient,
    challenges: ChallengeCache,
    architectures: readonly Architecture[]
  ) {
    this.logger = logger;
    this.httpClient = httpClient;
    this.challenges = challenges;
    this.architectures = architectures;
  }

  /**
   * Digests of the architectures of interest, at most one per architecture
   */
  async resolve(ref: ImageRef): Promise<ResolvedManifest> {
    const entries = await this.resolveAll(ref);
    // a list may offer several variants of one architecture; mirror only the first
    const filtered = dedupeByArchitecture(filterByArchitecture(entries, this.architectures));
    this.logger.debug(
      `[Resolver] ${formatImageRef(ref)}: kept ${filtered.length} of ${entries.length} platforms (${this.architectures.join(', ')})`
    );
    return withDigests(ref, filtered);
  }

  /**
   * Every platform the registry advertises for the tag, unfiltered
   */
  async resolveAll(ref: ImageRef): Promise<DigestEntry[]> {
    const challenge = await this.challenges.challengeFor(ref.registry);
    const token = await this.fetchToken(ref, challenge);
    const authorization = `Bearer ${token}`;

    const url = `${registryApiUrl(ref.registry)}/${ref.repository}/manifests/${ref.tag}`;
    this.logger.debug(`[Resolver] Fetching manifest ${url}`);
    const response = await this.httpClient.get(url, {
      headers: {
        Authorization: authorization,
        Accept: MANIFEST_ACCEPT,
      },
    });

    const mediaType = contentType(response);
    if (!isManifestMediaType(mediaType)) {
      throw new ProtocolError(
        `Unrecognized manifest media type for ${formatImageRef(ref)}: ${mediaType || '(none)'}`,
        ref.registry
      );
    }
    this.logger.debug(`[Resolver] ${formatImageRef(ref)} served as ${mediaType}`);

    switch (mediaType) {
      case MEDIA_TYPES.DOCKER_MANIFEST_LIST:
      case MEDIA_TYPES.OCI_INDEX:
        return this.entriesFromList(url, response.data);
      case MEDIA_TYPES.DOCKER_MANIFEST:
        return [await this.entryFromManifest(ref, url, response, authorization)];
      default: {
        const unhandled: never = mediaType;
        throw new ProtocolError(`Unhandled manifest media type: ${String(unhandled)}`, ref.registry);
      }
    }
  }

  /**
   * Anonymous bearer token scoped to the repository
   */
  private async fetchToken(ref: ImageRef, challenge: RegistryChallenge): Promise<string> {
    const tokenUrl = new URL(challenge.realm);
    for (const [key, value] of scopedParams(challenge, ref.repository)) {
      tokenUrl.searchParams.append(key, value);
    }

    this.logger.debug(`[Resolver] Requesting token from ${tokenUrl.toString()}`);
    const response = await this.httpClient.getJson(tokenUrl.toString(), tokenResponseSchema);
    const token = response.data.token ?? response.data.access_token;
    if (!token) {
      throw new ProtocolError(
        `Token response from ${tokenUrl.origin} has no token`,
        normalizeRegistryHost(ref.registry)
      );
    }
    return token;
  }

  private entriesFromList(url: string, body: string): DigestEntry[] {
    const list = parseJson(url, body, manifestListSchema);
    const entries: DigestEntry[] = [];
    for (const manifest of list.manifests) {
      // descriptors without a platform (attestations, artifacts) are not variants
      if (!manifest.platform) {
        continue;
      }
      entries.push(entry(manifest.platform.architecture, manifest.digest, manifest.platform.variant));
    }
    return dedupeByPlatform(entries);
  }

  /**
   * A single manifest names no architecture; read it from the config blob
   * and pair it with the manifest's own digest.
   */
  private async entryFromManifest(
    ref: ImageRef,
    url: string,
    response: RegistryApiResponse<string>,
    authorization: string
  ): Promise<DigestEntry> {
    const manifest = parseJson(url, response.data, imageManifestSchema);
    const digest = response.headers['docker-content-digest'];
    if (!digest) {
      throw new ProtocolError(
        `Manifest for ${formatImageRef(ref)} has no Docker-Content-Digest header`,
        ref.registry
      );
    }

    const blobUrl = `${registryApiUrl(ref.registry)}/${ref.repository}/blobs/${manifest.config.digest}`;
    this.logger.debug(`[Resolver] Fetching config blob ${blobUrl}`);
    const config = await this.httpClient.getJson(blobUrl, imageConfigSchema, {
      headers: { Authorization: authorization },
    });

    return entry(config.data.architecture, digest, config.data.variant);
  }
}

function entry(architecture: string, digest: string, variant?: string): DigestEntry {
  return variant ? { architecture, digest, variant } : { architecture, digest };
}

/**
 * Media type of a response without parameters
 */
function contentType(response: RegistryApiResponse<string>): string {
  const header = response.headers['content-type'] ?? '';
  return header.split(';')[0].trim().toLowerCase();
}
