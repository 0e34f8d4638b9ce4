/**
 * Provider error taxonomy
 */
import type { ProviderId } from '../types/chat.js';

export type ProviderErrorKind =
  | 'auth'
  | 'rate_limit'
  | 'network'
  | 'model'
  | 'validation'
  | 'timeout'
  | 'internal'
  | 'circuit_open'
  | 'cancelled';

const TRANSIENT_PATTERNS = ['timeout', 'connection', 'network', 'service unavailable', 'rate limit'];

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly retryable: boolean;
  readonly provider: ProviderId | undefined;
  readonly status: number | undefined;

  constructor(
    kind: ProviderErrorKind,
    message: string,
    options: { provider?: ProviderId; status?: number; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.kind = kind;
    this.provider = options.provider;
    this.status = options.status;
    this.retryable = options.retryable ?? isRetryableKind(kind);
  }
}

export class CircuitOpenError extends ProviderError {
  constructor(provider: ProviderId, retryInMs: number) {
    super('circuit_open', `Circuit breaker is open for provider ${provider}; retry in ${Math.ceil(retryInMs / 1000)}s`, {
      provider,
      retryable: false,
    });
    this.name = 'CircuitOpenError';
  }
}

export function isRetryableKind(kind: ProviderErrorKind): boolean {
  return kind === 'rate_limit' || kind === 'network' || kind === 'timeout';
}

/**
 * Map a non-2xx HTTP status to an error kind.
 */
export function kindForStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limit';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'network';
  return 'validation';
}

export function errorFromStatus(provider: ProviderId, status: number, body: string): ProviderError {
  const kind = kindForStatus(status);
  const snippet = body.length > 300 ? `${body.slice(0, 300)}...` : body;
  return new ProviderError(kind, `API error (status ${status}): ${snippet}`, {
    provider,
    status,
    retryable: isRetryableStatus(status),
  });
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status === 500 || status === 502 || status === 503 || status === 504;
}

/**
 * Whether an error is worth another attempt: either flagged retryable or
 * carrying one of the known transient phrases.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ProviderError) {
    if (error.kind === 'cancelled' || error.kind === 'circuit_open') return false;
    if (error.retryable) return true;
    if (error.kind === 'auth' || error.kind === 'validation') return false;
  }
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return TRANSIENT_PATTERNS.some(pattern => message.includes(pattern));
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}
