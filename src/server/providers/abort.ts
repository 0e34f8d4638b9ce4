import type { ProviderId } from '../types/chat.js';
import { ProviderError } from './errors.js';

/**
 * Translate an aborted caller signal into the matching provider error.
 * A deadline (TimeoutError reason) is a timeout; anything else is a cancellation.
 */
export function errorForAbortedSignal(provider: ProviderId, signal: AbortSignal, cause?: unknown): ProviderError {
  const reason: unknown = signal.reason;
  if (reason instanceof Error && reason.name === 'TimeoutError') {
    return new ProviderError('timeout', 'Request deadline exceeded', { provider, retryable: false, cause });
  }
  return new ProviderError('cancelled', 'Request was cancelled', { provider, retryable: false, cause });
}
