import { Logger } from '../logger';
import { HttpClient } from '../utils/api';
import { ProtocolError, RegistryChallenge } from '../types';
import { normalizeRegistryHost, registryApiUrl } from '../utils/validation';

/**
 * Repository name in the default scope; replaced per request
 */
export const SCOPE_PLACEHOLDER = 'user/image';

export const DEFAULT_SCOPE = `repository:${SCOPE_PLACEHOLDER}:pull`;

export const DEFAULT_PROBE_TIMEOUT = 5000;

/**
 * Parse a `WWW-Authenticate: Bearer k1="v1",k2=v2` header into its
 * parameters, in header order. Parameter names are case-insensitive and
 * returned lower-cased; quoted values are unescaped.
 */
export function parseAuthHeader(header: string, registry?: string): Map<string, string> {
  const scheme = /^Bearer(?:\s+|$)/i.exec(header);
  if (!scheme) {
    throw new ProtocolError(`Unsupported WWW-Authenticate scheme: ${header}`, registry);
  }

  const input = header.slice(scheme[0].length);
  const params = new Map<string, string>();
  let i = 0;

  const malformed = (reason: string): ProtocolError =>
    new ProtocolError(`Malformed WWW-Authenticate header (${reason}): ${header}`, registry);

  while (i < input.length) {
    while (i < input.length && /\s/.test(input[i])) {
      i++;
    }
    if (i >= input.length) {
      break;
    }
    if (input[i] === ',') {
      i++;
      continue;
    }

    const eq = input.indexOf('=', i);
    if (eq === -1) {
      throw malformed(`segment without "=" at offset ${i}`);
    }
    const key = input.slice(i, eq).trim();
    if (!key || /[\s",]/.test(key)) {
      throw malformed(`invalid parameter name "${key}"`);
    }

    i = eq + 1;
    while (i < input.length && input[i] === ' ') {
      i++;
    }

    let value = '';
    if (input[i] === '"') {
      i++;
      let closed = false;
      while (i < input.length) {
        const c = input[i];
        if (c === '\\') {
          if (i + 1 >= input.length) {
            break;
          }
          value += input[i + 1];
          i += 2;
          continue;
        }
        if (c === '"') {
          closed = true;
          i++;
          break;
        }
        value += c;
        i++;
      }
      if (!closed) {
        throw malformed(`unterminated quoted value for "${key}"`);
      }
    } else {
      const comma = input.indexOf(',', i);
      const end = comma === -1 ? input.length : comma;
      value = input.slice(i, end).trim();
      i = end;
    }

    while (i < input.length && /\s/.test(input[i])) {
      i++;
    }
    if (i < input.length && input[i] !== ',') {
      throw malformed(`unexpected "${input[i]}" after value of "${key}"`);
    }

    params.set(key.toLowerCase(), value);
  }

  return params;
}

/**
 * Hoist `realm` out of the parsed parameters and default the scope
 */
export function buildChallenge(parsed: ReadonlyMap<string, string>, registry?: string): RegistryChallenge {
  const realm = parsed.get('realm');
  if (!realm) {
    throw new ProtocolError('WWW-Authenticate challenge has no realm', registry);
  }
  if (!URL.canParse(realm)) {
    throw new ProtocolError(`WWW-Authenticate realm is not a URL: ${realm}`, registry);
  }

  const params = new Map<string, string>();
  for (const [key, value] of parsed) {
    if (key !== 'realm') {
      params.set(key, value);
    }
  }
  if (!params.has('scope')) {
    params.set('scope', DEFAULT_SCOPE);
  }

  return Object.freeze({ realm, params });
}

/**
 * Token request parameters for one repository: the scope placeholder is
 * replaced, every other parameter is passed through untouched.
 */
export function scopedParams(challenge: RegistryChallenge, repository: string): Map<string, string> {
  const params = new Map(challenge.params);
  const scope = params.get('scope');
  if (scope !== undefined) {
    params.set('scope', scope.replaceAll(SCOPE_PLACEHOLDER, repository));
  }
  return params;
}

/**
 * Bearer challenges per registry host, probed at most once per host for the
 * lifetime of the cache. Callers that arrive while a probe is in flight wait
 * for it; a failed probe is dropped so a later caller can try again.
 */
export class ChallengeCache {
  private readonly logger: Logger;
  private readonly httpClient: HttpClient;
  private readonly probeTimeout: number;
  private readonly entries = new Map<string, Promise<RegistryChallenge>>();

  constructor(logger: Logger, httpClient: HttpClient, probeTimeout: number = DEFAULT_PROBE_TIMEOUT) {
    this.logger = logger;
    this.httpClient = httpClient;
    this.probeTimeout = probeTimeout;
  }

  challengeFor(registry: string): Promise<RegistryChallenge> {
    const key = normalizeRegistryHost(registry);
    const cached = this.entries.get(key);
    if (cached) {
      this.logger.debug(`[Challenge] Using cached challenge for ${key}`);
      return cached;
    }

    const pending = this.probe(key).catch((error: unknown) => {
      this.entries.delete(key);
      throw error;
    });
    this.entries.set(key, pending);
    return pending;
  }

  private async probe(registry: string): Promise<RegistryChallenge> {
    const url = `${registryApiUrl(registry)}/`;
    this.logger.debug(`[Challenge] Probing ${url}`);

    const response = await this.httpClient.request(url, { timeout: this.probeTimeout });
    if (response.status !== 401) {
      throw new ProtocolError(
        `Expected an auth challenge from ${url}, got ${response.status} ${response.statusText}`.trim(),
        registry,
        response.status
      );
    }

    const header = response.headers['www-authenticate'];
    if (!header) {
      throw new ProtocolError(`401 from ${url} carries no WWW-Authenticate header`, registry, 401);
    }

    const challenge = buildChallenge(parseAuthHeader(header, registry), registry);
    this.logger.debug(`[Challenge] ${registry}: realm ${challenge.realm}, params ${[...challenge.params.keys()].join(', ')}`);
    return challenge;
  }
}
