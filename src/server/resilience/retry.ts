/**
 * Retry with exponential backoff, gated by the provider's circuit breaker
 */
import { setTimeout as sleepFor } from 'node:timers/promises';
import { errorForAbortedSignal } from '../providers/abort.js';
import { isRetryableError } from '../providers/errors.js';
import type { ProviderId } from '../types/chat.js';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: boolean;
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ExecuteOptions {
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

const defaultSleep: Sleeper = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

/**
 * Delay before the attempt following `attempt` (1-based).
 */
export function computeDelay(config: RetryConfig, attempt: number, random: () => number = Math.random): number {
  const exponential = config.baseDelayMs * Math.pow(config.multiplier, attempt - 1);
  const capped = Math.min(exponential, config.maxDelayMs);
  return config.jitter ? capped + capped * 0.25 * random() : capped;
}

export class ResilienceExecutor {
  private readonly sleep: Sleeper;
  private readonly random: () => number;

  constructor(
    private readonly config: RetryConfig,
    readonly breakers: CircuitBreakerRegistry,
    options: { sleep?: Sleeper; random?: () => number } = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async execute<T>(provider: ProviderId, fn: (attempt: number) => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
    const { signal } = options;
    const breaker = this.breakers.get(provider);
    const maxAttempts = Math.max(1, this.config.maxAttempts);

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw errorForAbortedSignal(provider, signal);
      }

      try {
        return await breaker.call(() => fn(attempt));
      } catch (error) {
        if (attempt >= maxAttempts || !isRetryableError(error)) {
          throw error;
        }

        const delay = computeDelay(this.config, attempt, this.random);
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[Resilience] ${provider} attempt ${attempt}/${maxAttempts} failed (${reason}); retrying in ${Math.round(delay)}ms`);
        options.onRetry?.(attempt, delay, error);

        try {
          await this.sleep(delay, signal);
        } catch (sleepError) {
          if (signal?.aborted) {
            throw errorForAbortedSignal(provider, signal, sleepError);
          }
          throw sleepError;
        }
      }
    }
  }
}
