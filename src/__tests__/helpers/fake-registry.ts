import { MEDIA_TYPES } from '../../types';

export const DOCKER_HUB_CHALLENGE =
  'Bearer realm="https://auth.docker.io/token",service="registry.docker.io",scope="repository:user/image:pull"';

export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
}

type Handler = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * In-process stand-in for a set of registries, installed in place of fetch.
 * Routes match on origin and path; the query string is ignored for matching
 * but kept in the recorded request.
 */
export class FakeRegistry {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, Handler>();

  on(url: string, handler: Handler | Response): this {
    const key = routeKey(url);
    if (handler instanceof Response) {
      // a Response body can only be read once
      const template = handler;
      this.routes.set(key, () => template.clone());
    } else {
      this.routes.set(key, handler);
    }
    return this;
  }

  /**
   * Routes for the usual anonymous-token flow of one host
   */
  registry(host: string, challenge: string = DOCKER_HUB_CHALLENGE, token: string = 'test-token'): this {
    this.on(`https://${host}/v2/`, challengeResponse(challenge));
    const realm = /realm="([^"]+)"/.exec(challenge);
    if (realm) {
      this.on(realm[1], jsonResponse({ token }));
    }
    return this;
  }

  requestsTo(url: string): RecordedRequest[] {
    const key = routeKey(url);
    return this.requests.filter((request) => routeKey(request.url) === key);
  }

  readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = input instanceof Request ? input.url : input.toString();
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });

    const request = { url, headers };
    this.requests.push(request);

    const handler = this.routes.get(routeKey(url));
    if (!handler) {
      throw new TypeError(`fetch failed: no route for ${url}`);
    }
    return handler(request);
  };
}

function routeKey(url: string): string {
  const parsed = new URL(url);
  return `${parsed.origin}${parsed.pathname}`;
}

export function challengeResponse(header: string = DOCKER_HUB_CHALLENGE): Response {
  return new Response(JSON.stringify({ errors: [{ code: 'UNAUTHORIZED', message: 'authentication required' }] }), {
    status: 401,
    headers: { 'Content-Type': 'application/json', 'WWW-Authenticate': header },
  });
}

export function jsonResponse(body: unknown, status: number = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function errorResponse(status: number, code: string, message: string): Response {
  return jsonResponse({ errors: [{ code, message }] }, status);
}

export interface PlatformManifest {
  architecture: string;
  digest: string;
  variant?: string;
}

export function manifestListResponse(
  platforms: PlatformManifest[],
  mediaType: string = MEDIA_TYPES.DOCKER_MANIFEST_LIST
): Response {
  const body = {
    schemaVersion: 2,
    mediaType,
    manifests: platforms.map((platform) => ({
      mediaType: MEDIA_TYPES.DOCKER_MANIFEST,
      digest: platform.digest,
      size: 1024,
      platform: {
        architecture: platform.architecture,
        os: 'linux',
        ...(platform.variant ? { variant: platform.variant } : {}),
      },
    })),
  };
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': mediaType } });
}

export function singleManifestResponse(configDigest: string, manifestDigest: string): Response {
  const body = {
    schemaVersion: 2,
    mediaType: MEDIA_TYPES.DOCKER_MANIFEST,
    config: {
      mediaType: 'application/vnd.docker.container.image.v1+json',
      size: 1469,
      digest: configDigest,
    },
    layers: [],
  };
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: {
      'Content-Type': MEDIA_TYPES.DOCKER_MANIFEST,
      'Docker-Content-Digest': manifestDigest,
    },
  });
}

export function installFakeRegistry(registry: FakeRegistry): jest.SpyInstance {
  return jest.spyOn(global, 'fetch').mockImplementation(registry.fetch);
}
