import { z } from 'zod';
import { Logger } from '../logger';
import {
  AuthorizationDeniedError,
  HttpClientOptions,
  NotFoundError,
  ProtocolError,
  RegistryApiResponse,
  RegistryError,
  RequestOptions,
  TransportError,
} from '../types';
import { errorMessage, errorName } from './errors';

const registryErrorBodySchema = z.object({
  errors: z
    .array(
      z
        .object({
          code: z.string().optional(),
          message: z.string().optional(),
        })
        .passthrough()
    )
    .min(1),
});

/**
 * HTTP client with per-request timeouts and registry error mapping.
 * Requests are never retried here; retrying belongs to the caller.
 */
export class HttpClient {
  private readonly logger: Logger;
  private readonly timeout: number;
  private readonly defaultHeaders: Record<string, string>;

  constructor(logger: Logger, options: HttpClientOptions = {}) {
    this.logger = logger;
    this.timeout = options.timeout ?? 60000;
    this.defaultHeaders = options.headers ?? {};
  }

  /**
   * Issue a GET and return the response whatever its status.
   * Network failures and timeouts become TransportError.
   */
  async request(url: string, options: RequestOptions = {}): Promise<RegistryApiResponse<string>> {
    const timeout = options.timeout ?? this.timeout;
    const registry = hostOf(url);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    this.logger.debug(`GET ${url} (timeout ${timeout}ms)`);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { ...this.defaultHeaders, ...options.headers },
        signal: controller.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      const data = await response.text();
      this.logger.debug(`GET ${url} -> ${response.status}`);

      return {
        data,
        status: response.status,
        statusText: response.statusText,
        headers,
      };
    } catch (error) {
      if (errorName(error) === 'AbortError') {
        throw new TransportError(`Request to ${url} timed out after ${timeout}ms`, registry);
      }
      const message = errorMessage(error);
      throw new TransportError(`Network error connecting to ${registry}: ${message}`, registry);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * GET that fails on any non-2xx status
   */
  async get(url: string, options: RequestOptions = {}): Promise<RegistryApiResponse<string>> {
    const response = await this.request(url, options);
    if (response.status < 200 || response.status >= 300) {
      throw errorForStatus(url, response);
    }
    return response;
  }

  /**
   * GET a JSON document and validate it against schema
   */
  async getJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<RegistryApiResponse<T>> {
    const response = await this.get(url, options);
    return { ...response, data: parseJson(url, response.data, schema) };
  }
}

/**
 * Parse and validate a JSON body, raising ProtocolError when it does not fit
 */
export function parseJson<T>(url: string, body: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    const message = errorMessage(error);
    throw new ProtocolError(`Malformed JSON from ${url}: ${message}`, hostOf(url));
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ProtocolError(`Unexpected response from ${url}: ${issues}`, hostOf(url));
  }
  return result.data;
}

/**
 * Map a failed response onto the registry error taxonomy
 */
export function errorForStatus(url: string, response: RegistryApiResponse<string>): RegistryError {
  const registry = hostOf(url);
  const message = `GET ${url} failed with ${response.status}: ${getErrorMessage(response)}`;

  switch (response.status) {
    case 403:
      return new AuthorizationDeniedError(message, registry);
    case 404:
      return new NotFoundError(message, registry);
    default:
      return new RegistryError(message, response.status, registry);
  }
}

/**
 * Prefer the registry's own error message (Distribution error body)
 */
function getErrorMessage(response: RegistryApiResponse<string>): string {
  const fromBody = messageFromErrorBody(response.data);
  if (fromBody) {
    return fromBody;
  }

  switch (response.status) {
    case 401:
      return 'Authentication failed';
    case 403:
      return 'Access forbidden';
    case 404:
      return 'Resource not found';
    case 429:
      return 'Rate limit exceeded';
    default:
      return response.statusText || `HTTP ${response.status}`;
  }
}

function messageFromErrorBody(body: string): string | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return undefined;
  }

  const parsed = registryErrorBodySchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  const [first] = parsed.data.errors;
  return first.message ?? first.code;
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}
