import { ForgeLoopError } from '../utils/error-handler.js';
import type { RateLimitInfo } from './rate-limit.js';

export type RemoteFailureKind = 'rate_limit' | 'http' | 'network';

export interface RemoteRequestErrorInit {
  kind: RemoteFailureKind;
  url: string;
  diagnostic: string;
  status?: number;
  rateLimit?: RateLimitInfo;
  cause?: unknown;
}

/**
 * A request that did not produce a 2xx response.
 * `diagnostic` is the ready-to-print report and always names the URL
 * (and the status, when the server answered).
 */
export class RemoteRequestError extends ForgeLoopError {
  readonly kind: RemoteFailureKind;
  readonly url: string;
  readonly status: number | undefined;
  readonly diagnostic: string;
  readonly rateLimit: RateLimitInfo | undefined;

  constructor(init: RemoteRequestErrorInit) {
    const summary =
      init.status === undefined
        ? `Request to ${init.url} failed`
        : `Request failed with status ${init.status} for ${init.url}`;
    super(summary, 'github', init.cause);
    this.name = 'RemoteRequestError';
    this.kind = init.kind;
    this.url = init.url;
    this.status = init.status;
    this.diagnostic = init.diagnostic;
    this.rateLimit = init.rateLimit;
  }

  get isRateLimited(): boolean {
    return this.kind === 'rate_limit';
  }
}

export class ResponseFormatError extends ForgeLoopError {
  constructor(message: string, public readonly url: string, originalError?: unknown) {
    super(message, 'github', originalError);
    this.name = 'ResponseFormatError';
  }
}

export class TrustStoreError extends ForgeLoopError {
  constructor(message: string, originalError?: unknown) {
    super(message, 'tls', originalError);
    this.name = 'TrustStoreError';
  }
}
