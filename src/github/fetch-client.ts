/**
 * HTTP client for the GitHub API
 *
 * One instance per run, built by the orchestrator and passed down. Every
 * request is a single attempt: a non-2xx answer becomes a RemoteRequestError
 * and the decision to retry or abort stays with the caller.
 */

import { fetch, type Dispatcher, type Response } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';
import { ResponseFormatError, RemoteRequestError } from './errors.js';
import {
  formatRateLimitDiagnostic,
  hasRateLimitInfo,
  parseRateLimitHeaders,
  RATE_LIMIT_STATUSES,
  type HeaderSource,
  type RateLimitInfo,
} from './rate-limit.js';
import { createTrustedAgent, type TrustedAgentOptions } from './trust-store.js';
import { DEFAULT_GITHUB_API_URL } from '../utils/config.js';
import { ErrorHandler } from '../utils/error-handler.js';
import type { Logger } from '../utils/logger.js';

/** Environment variables consulted for a token, in order */
export const TOKEN_ENV_VARS = ['GH_TOKEN', 'GITHUB_TOKEN'] as const;

export const DEFAULT_USER_AGENT = 'forgeloop-cli';

export interface FetchClientOptions {
  dispatcher: Dispatcher;
  /** Explicit token (e.g. --github-token); wins over the environment */
  token?: string;
  env?: NodeJS.ProcessEnv;
  apiBaseUrl?: string;
  userAgent?: string;
  logger?: Logger;
  /** Close the dispatcher in close() (default: true) */
  ownsDispatcher?: boolean;
}

export interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
}

export type CreateFetchClientOptions = Omit<FetchClientOptions, 'dispatcher' | 'ownsDispatcher'> &
  TrustedAgentOptions;

/**
 * Resolve the bearer token: explicit value, then GH_TOKEN, then GITHUB_TOKEN.
 * Blank candidates are skipped.
 */
export function resolveToken(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const candidates = [explicit, ...TOKEN_ENV_VARS.map((name) => env[name])];
  for (const candidate of candidates) {
    const token = candidate?.trim();
    if (token) return token;
  }
  return undefined;
}

export function buildAuthHeaders(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const token = resolveToken(explicit, env);
  return token ? { Authorization: `Bearer ${token}` } : {};
}

/**
 * Turn a non-2xx answer into the error shown to the user.
 * Only a rate-limit status that also carries rate-limit headers gets the
 * rate-limit report; everything else gets the plain status line.
 */
export function classifyFailure(status: number, headers: HeaderSource, url: string): RemoteRequestError {
  const rateLimit = parseRateLimitHeaders(headers);

  if (RATE_LIMIT_STATUSES.has(status) && hasRateLimitInfo(rateLimit)) {
    return new RemoteRequestError({
      kind: 'rate_limit',
      status,
      url,
      rateLimit,
      diagnostic: formatRateLimitDiagnostic(status, headers, url),
    });
  }

  return new RemoteRequestError({
    kind: 'http',
    status,
    url,
    rateLimit: hasRateLimitInfo(rateLimit) ? rateLimit : undefined,
    diagnostic: `Request failed with status ${status} for ${url}`,
  });
}

export class FetchClient {
  readonly apiBaseUrl: string;
  private readonly dispatcher: Dispatcher;
  private readonly token: string | undefined;
  private readonly env: NodeJS.ProcessEnv;
  private readonly userAgent: string;
  private readonly logger: Logger | undefined;
  private readonly ownsDispatcher: boolean;
  private closed = false;

  constructor(options: FetchClientOptions) {
    this.dispatcher = options.dispatcher;
    this.token = options.token;
    this.env = options.env ?? process.env;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_GITHUB_API_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger;
    this.ownsDispatcher = options.ownsDispatcher ?? true;
  }

  /**
   * Build a client whose TLS trust comes from the OS certificate store.
   */
  static async create(options: CreateFetchClientOptions = {}): Promise<FetchClient> {
    const dispatcher = await createTrustedAgent(options);
    return new FetchClient({ ...options, dispatcher, ownsDispatcher: true });
  }

  /**
   * Authorization header for a request; empty when no token resolves.
   * An explicit argument overrides the token the client was built with.
   */
  authHeaders(explicitToken?: string): Record<string, string> {
    return buildAuthHeaders(explicitToken ?? this.token, this.env);
  }

  get isAuthenticated(): boolean {
    return resolveToken(this.token, this.env) !== undefined;
  }

  apiUrl(pathname: string): string {
    return `${this.apiBaseUrl}/${pathname.replace(/^\/+/, '')}`;
  }

  async request(url: string, options: RequestOptions = {}): Promise<Response> {
    if (this.closed) {
      throw new Error('FetchClient has been closed');
    }

    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': this.userAgent,
      ...this.authHeaders(),
      ...options.headers,
    };
    const method = options.method ?? 'GET';

    this.logger?.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await fetch(url, { method, headers, dispatcher: this.dispatcher });
    } catch (error) {
      const reason = describeNetworkError(error);
      throw new RemoteRequestError({
        kind: 'network',
        url,
        cause: error,
        diagnostic: `Request to ${url} failed: ${reason}`,
      });
    }

    if (!response.ok) {
      // Discard the body so the socket can be reused
      await response.body?.cancel();
      const failure = classifyFailure(response.status, response.headers, url);
      this.logger?.debug(`${url} -> ${response.status} (${failure.kind})`);
      throw failure;
    }

    return response;
  }

  async getJson<T>(url: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const response = await this.request(url);

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ResponseFormatError(`Response from ${url} is not valid JSON`, url, error);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const first = result.error.issues[0];
      const where = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'unknown shape';
      throw new ResponseFormatError(`Unexpected response from ${url} (${where})`, url, result.error);
    }
    return result.data;
  }

  async download(url: string): Promise<Buffer> {
    const response = await this.request(url, {
      headers: { Accept: 'application/octet-stream' },
    });
    return Buffer.from(await response.arrayBuffer());
  }

  /**
   * Current quota, read from the headers of GET /rate_limit.
   */
  async rateLimitStatus(): Promise<RateLimitInfo> {
    const response = await this.request(this.apiUrl('rate_limit'));
    await response.body?.cancel();
    return parseRateLimitHeaders(response.headers);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

function describeNetworkError(error: unknown): string {
  // undici reports "fetch failed" and hides the socket error in `cause`
  const message = ErrorHandler.getErrorMessage(error);
  if (typeof error === 'object' && error !== null && 'cause' in error && error.cause) {
    const cause = ErrorHandler.getErrorMessage(error.cause);
    if (cause) {
      return `${message} (${cause})`;
    }
  }
  return message;
}
