/**
 * Per-provider circuit breaker
 *
 * closed    -> open       after `threshold` consecutive failures
 * open      -> half-open  once `timeoutMs` has passed since the last failure
 * half-open -> closed     on one success
 * half-open -> open       on one failure (timer restarts)
 */
import { CircuitOpenError, ProviderError } from '../providers/errors.js';
import type { ProviderId } from '../types/chat.js';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerConfig {
  threshold: number;
  timeoutMs: number;
}

export interface CircuitSnapshot {
  state: CircuitState;
  failureCount: number;
  lastFailureAt: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private lastFailureAt: number | null = null;
  private probeInFlight = false;

  constructor(
    readonly provider: ProviderId,
    private readonly config: CircuitBreakerConfig,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Run `fn` unless the circuit refuses it. Refusals throw CircuitOpenError
   * without invoking `fn`.
   */
  async call<T>(fn: () => Promise<T>): Promise<T> {
    this.admit();
    const isProbe = this.state === 'half-open';
    if (isProbe) this.probeInFlight = true;

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      // cancellations do not count as failures
      if (!(error instanceof ProviderError && error.kind === 'cancelled')) {
        this.recordFailure();
      }
      throw error;
    } finally {
      if (isProbe) this.probeInFlight = false;
    }
  }

  getState(): CircuitState {
    this.refresh();
    return this.state;
  }

  snapshot(): CircuitSnapshot {
    this.refresh();
    return { state: this.state, failureCount: this.failureCount, lastFailureAt: this.lastFailureAt };
  }

  reset(): void {
    this.state = 'closed';
    this.failureCount = 0;
    this.lastFailureAt = null;
    this.probeInFlight = false;
  }

  private refresh(): void {
    if (this.state === 'open' && this.lastFailureAt !== null && this.now() - this.lastFailureAt >= this.config.timeoutMs) {
      this.state = 'half-open';
    }
  }

  private admit(): void {
    this.refresh();

    if (this.state === 'open') {
      const elapsed = this.lastFailureAt === null ? 0 : this.now() - this.lastFailureAt;
      throw new CircuitOpenError(this.provider, this.config.timeoutMs - elapsed);
    }
    // Only one trial call while half-open
    if (this.state === 'half-open' && this.probeInFlight) {
      throw new CircuitOpenError(this.provider, 0);
    }
  }

  private recordSuccess(): void {
    this.failureCount = 0;
    this.state = 'closed';
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureAt = this.now();

    if (this.state === 'half-open' || this.failureCount >= this.config.threshold) {
      if (this.state !== 'open') {
        console.warn(`[Resilience] Circuit opened for ${this.provider} after ${this.failureCount} consecutive failures`);
      }
      this.state = 'open';
    }
  }
}

export class CircuitBreakerRegistry {
  private breakers = new Map<ProviderId, CircuitBreaker>();

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly now: () => number = Date.now
  ) {}

  get(provider: ProviderId): CircuitBreaker {
    let breaker = this.breakers.get(provider);
    if (!breaker) {
      breaker = new CircuitBreaker(provider, this.config, this.now);
      this.breakers.set(provider, breaker);
    }
    return breaker;
  }

  snapshot(): Partial<Record<ProviderId, CircuitSnapshot>> {
    const result: Partial<Record<ProviderId, CircuitSnapshot>> = {};
    for (const [provider, breaker] of this.breakers) {
      result[provider] = breaker.snapshot();
    }
    return result;
  }
}
