import {
  Architecture,
  ImageRef,
  MirrorCommand,
  MirrorConfig,
  SUPPORTED_ARCHITECTURES,
} from '../types';

const REGISTRY_ALIASES: Record<string, string> = {
  'docker.io': 'registry-1.docker.io',
  'index.docker.io': 'registry-1.docker.io',
};

/**
 * Validate and parse the command input
 */
export function validateCommand(command: string): MirrorCommand {
  const validCommands: MirrorCommand[] = ['update', 'sync'];
  const match = validCommands.find((candidate) => candidate === command);
  if (!match) {
    throw new Error(`Invalid command: ${command}. Must be one of: ${validCommands.join(', ')}`);
  }
  return match;
}

export function isArchitecture(value: string): value is Architecture {
  return SUPPORTED_ARCHITECTURES.some((arch) => arch === value);
}

/**
 * Parse a comma-separated architecture allow-list
 */
export function parseArchitectures(input: string): Architecture[] {
  const architectures: Architecture[] = [];
  for (const raw of splitList(input)) {
    const value = raw.toLowerCase();
    if (!isArchitecture(value)) {
      throw new Error(
        `Unsupported architecture: ${raw}. Must be one of: ${SUPPORTED_ARCHITECTURES.join(', ')}`
      );
    }
    if (!architectures.includes(value)) {
      architectures.push(value);
    }
  }

  if (architectures.length === 0) {
    throw new Error('architectures must name at least one architecture');
  }
  return architectures;
}

/**
 * Parse a comma-separated list of HTTP status codes
 */
export function parseStatusList(input: string): number[] {
  const statuses: number[] = [];
  for (const raw of splitList(input)) {
    if (!/^\d{3}$/.test(raw)) {
      throw new Error(`Invalid HTTP status: ${raw}`);
    }
    const status = parseInt(raw, 10);
    if (status < 400 || status > 599) {
      throw new Error(`Tolerated status must be an HTTP error status (400-599): ${raw}`);
    }
    if (!statuses.includes(status)) {
      statuses.push(status);
    }
  }
  return statuses;
}

/**
 * Longest delay setTimeout accepts; anything above fires immediately
 */
export const MAX_TIMEOUT_MS = 2147483647;

/**
 * Parse a positive integer input, falling back to the default when empty
 */
export function parsePositiveInteger(
  name: string,
  input: string,
  defaultValue: number,
  max: number = Number.MAX_SAFE_INTEGER
): number {
  if (!input.trim()) {
    return defaultValue;
  }
  if (!/^\d+$/.test(input.trim())) {
    throw new Error(`${name} must be a positive integer, got: ${input}`);
  }
  const value = parseInt(input, 10);
  if (value <= 0) {
    throw new Error(`${name} must be a positive integer, got: ${input}`);
  }
  if (value > max) {
    throw new Error(`${name} must be at most ${max}, got: ${input}`);
  }
  return value;
}

/**
 * Validate mirror configuration
 */
export function validateMirrorConfig(command: MirrorCommand, config: Partial<MirrorConfig>): void {
  if (!config.architectures || config.architectures.length === 0) {
    throw new Error('architectures must name at least one architecture');
  }

  if (config.concurrency !== undefined && config.concurrency < 1) {
    throw new Error('concurrency must be at least 1');
  }

  if (command === 'sync') {
    if (!config.destinationRegistry) {
      throw new Error('destination-registry is required for sync');
    }
    if (!config.destinationPrefix) {
      throw new Error(
        'destination-prefix is required for sync (or set GITHUB_REPOSITORY_OWNER)'
      );
    }
    if (!/^[a-z0-9]+(?:[._/-][a-z0-9]+)*[._/-]?$/.test(config.destinationPrefix)) {
      throw new Error(`destination-prefix is not a valid repository prefix: ${config.destinationPrefix}`);
    }
  }
}

/**
 * Normalize registry host (remove protocol, trailing slashes, resolve aliases)
 */
export function normalizeRegistryHost(registry: string): string {
  const host = registry
    .trim()
    .replace(/^https?:\/\//, '')
    .replace(/\/+$/, '')
    .toLowerCase();
  return REGISTRY_ALIASES[host] ?? host;
}

/**
 * Base URL of a registry's V2 API
 */
export function registryApiUrl(registry: string): string {
  return `https://${normalizeRegistryHost(registry)}/v2`;
}

/**
 * Destination reference for a source image:
 * `{registry}/{prefix}{repository with "/" replaced by "-"}:{tag}`
 */
export function destinationRef(source: ImageRef, destinationRegistry: string, prefix: string): ImageRef {
  return {
    registry: normalizeRegistryHost(destinationRegistry),
    repository: `${prefix}${source.repository.replaceAll('/', '-')}`,
    tag: source.tag,
  };
}

/**
 * `registry/repository:tag`
 */
export function formatImageRef(ref: ImageRef): string {
  return `${ref.registry}/${ref.repository}:${ref.tag}`;
}

function splitList(input: string): string[] {
  return input
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
