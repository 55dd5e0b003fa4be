/**
 * Type definitions for the Registry Mirror Action
 */

export type MirrorCommand = 'update' | 'sync';

/**
 * Architectures a deployment can mirror. An entry with a variant suffix only
 * matches that platform variant.
 */
export const SUPPORTED_ARCHITECTURES = ['amd64', 'arm64', 'arm64/v8'] as const;

export type Architecture = (typeof SUPPORTED_ARCHITECTURES)[number];

/**
 * Manifest media types understood by the resolver
 */
export const MEDIA_TYPES = {
  DOCKER_MANIFEST_LIST: 'application/vnd.docker.distribution.manifest.list.v2+json',
  OCI_INDEX: 'application/vnd.oci.image.index.v1+json',
  DOCKER_MANIFEST: 'application/vnd.docker.distribution.manifest.v2+json',
} as const;

export type ManifestMediaType = (typeof MEDIA_TYPES)[keyof typeof MEDIA_TYPES];

/**
 * Bearer challenge advertised by a registry's /v2/ endpoint
 */
export interface RegistryChallenge {
  readonly realm: string;
  readonly params: ReadonlyMap<string, string>;
}

/**
 * One tag in one repository on one registry host
 */
export interface ImageRef {
  readonly registry: string;
  readonly repository: string;
  readonly tag: string;
}

/**
 * Content digest of one platform variant
 */
export interface DigestEntry {
  readonly architecture: string;
  readonly digest: string;
  readonly variant?: string;
}

/**
 * A tag together with the digests of the architectures of interest
 */
export interface ResolvedManifest extends ImageRef {
  readonly digests: readonly DigestEntry[];
}

/**
 * Durable list of images to keep mirrored
 */
export interface Inventory {
  readonly images: readonly ResolvedManifest[];
}

/**
 * Mirror configuration shared by both commands
 */
export interface MirrorConfig {
  dryRun: boolean;
  architectures: Architecture[];
  destinationRegistry: string;
  destinationPrefix: string;
  toleratedStatuses: number[];
  concurrency: number;
  verbose: boolean;
}

/**
 * Credentials used to log in to the destination registry before pushing
 */
export interface RegistryCredentials {
  registry: string;
  username: string;
  password: string;
}

/**
 * Failure of a single image; other images are still attempted
 */
export interface ImageFailure {
  image: string;
  error: string;
}

/**
 * Result of the update command
 */
export interface UpdateResult {
  images: ResolvedManifest[];
  updatedImages: string[];
  errors: ImageFailure[];
}

/**
 * Result of the sync command
 */
export interface SyncResult {
  syncedImages: string[];
  upToDateImages: string[];
  errors: ImageFailure[];
}

/**
 * What sync has to do for one image
 */
export interface SyncPlan {
  source: ResolvedManifest;
  destination: ImageRef;
  missingDigests: string[];
}

/**
 * HTTP client options
 */
export interface HttpClientOptions {
  timeout?: number;
  headers?: Record<string, string>;
}

/**
 * Per-request options
 */
export interface RequestOptions {
  headers?: Record<string, string>;
  timeout?: number;
}

/**
 * Registry API response types
 */
export interface RegistryApiResponse<T = unknown> {
  data: T;
  status: number;
  statusText: string;
  headers: Record<string, string>;
}

/**
 * Error types
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly registry?: string
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

/**
 * DNS, connection and timeout failures
 */
export class TransportError extends RegistryError {
  constructor(message: string, registry?: string) {
    super(message, undefined, registry);
    this.name = 'TransportError';
  }
}

/**
 * The registry answered outside the supported contract
 */
export class ProtocolError extends RegistryError {
  constructor(message: string, registry?: string, statusCode?: number) {
    super(message, statusCode, registry);
    this.name = 'ProtocolError';
  }
}

export class NotFoundError extends RegistryError {
  constructor(message: string, registry?: string) {
    super(message, 404, registry);
    this.name = 'NotFoundError';
  }
}

export class AuthorizationDeniedError extends RegistryError {
  constructor(message: string, registry?: string) {
    super(message, 403, registry);
    this.name = 'AuthorizationDeniedError';
  }
}
