import { describe, it, expect, vi } from 'vitest';
import { CircuitOpenError, ProviderError, isRetryableError } from '../src/server/providers/errors.js';
import { CircuitBreaker, CircuitBreakerRegistry } from '../src/server/resilience/circuit-breaker.js';
import { ResilienceExecutor, computeDelay, type RetryConfig } from '../src/server/resilience/retry.js';

function networkError(): ProviderError {
  return new ProviderError('network', 'connection reset', { provider: 'openai' });
}

function fakeClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => { current += ms; },
  };
}

describe('CircuitBreaker', () => {
  it('opens after the failure threshold and refuses without calling fn', async () => {
    const clock = fakeClock();
    const breaker = new CircuitBreaker('anthropic', { threshold: 3, timeoutMs: 1000 }, clock.now);
    const failing = vi.fn(async () => { throw networkError(); });

    for (let i = 0; i < 3; i++) {
      await expect(breaker.call(failing)).rejects.toBeInstanceOf(ProviderError);
    }
    expect(breaker.getState()).toBe('open');

    const fn = vi.fn(async () => 'ok');
    await expect(breaker.call(fn)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('moves to half-open after the timeout and closes on one success', async () => {
    const clock = fakeClock();
    const breaker = new CircuitBreaker('anthropic', { threshold: 1, timeoutMs: 1000 }, clock.now);

    await expect(breaker.call(async () => { throw networkError(); })).rejects.toThrow('connection reset');
    expect(breaker.getState()).toBe('open');

    clock.advance(999);
    expect(breaker.getState()).toBe('open');
    clock.advance(1);
    expect(breaker.getState()).toBe('half-open');

    await expect(breaker.call(async () => 'ok')).resolves.toBe('ok');
    expect(breaker.snapshot()).toEqual({ state: 'closed', failureCount: 0, lastFailureAt: clock.now() - 1000 });
  });

  it('reopens on a failed probe', async () => {
    const clock = fakeClock();
    const breaker = new CircuitBreaker('openai', { threshold: 2, timeoutMs: 500 }, clock.now);
    const fail = async () => { throw networkError(); };

    await expect(breaker.call(fail)).rejects.toThrow();
    await expect(breaker.call(fail)).rejects.toThrow();
    clock.advance(500);
    expect(breaker.getState()).toBe('half-open');

    await expect(breaker.call(fail)).rejects.toThrow('connection reset');
    expect(breaker.getState()).toBe('open');
  });

  it('allows only one probe while half-open', async () => {
    const clock = fakeClock();
    const breaker = new CircuitBreaker('openai', { threshold: 1, timeoutMs: 100 }, clock.now);
    await expect(breaker.call(async () => { throw networkError(); })).rejects.toThrow();
    clock.advance(100);

    let finishProbe: (value: string) => void = () => {};
    const probe = breaker.call(() => new Promise<string>(resolve => { finishProbe = resolve; }));
    await expect(breaker.call(async () => 'second')).rejects.toBeInstanceOf(CircuitOpenError);

    finishProbe('first');
    await expect(probe).resolves.toBe('first');
    expect(breaker.getState()).toBe('closed');
  });

  it('does not count cancellations as failures', async () => {
    const breaker = new CircuitBreaker('anthropic', { threshold: 1, timeoutMs: 1000 });
    const cancelled = new ProviderError('cancelled', 'Request was cancelled', { provider: 'anthropic' });

    await expect(breaker.call(async () => { throw cancelled; })).rejects.toBe(cancelled);
    expect(breaker.getState()).toBe('closed');
  });

  it('keeps one breaker per provider in the registry', () => {
    const registry = new CircuitBreakerRegistry({ threshold: 1, timeoutMs: 1000 });
    expect(registry.get('openai')).toBe(registry.get('openai'));
    expect(registry.get('openai')).not.toBe(registry.get('anthropic'));
    expect(Object.keys(registry.snapshot()).sort()).toEqual(['anthropic', 'openai']);
  });
});

describe('computeDelay', () => {
  const config: RetryConfig = { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 30000, multiplier: 2, jitter: false };

  it('grows exponentially and caps at the max delay', () => {
    expect(computeDelay(config, 1)).toBe(1000);
    expect(computeDelay(config, 2)).toBe(2000);
    expect(computeDelay(config, 5)).toBe(16000);
    expect(computeDelay(config, 6)).toBe(30000);
  });

  it('adds up to 25% jitter', () => {
    const jittered = { ...config, jitter: true };
    expect(computeDelay(jittered, 1, () => 0)).toBe(1000);
    expect(computeDelay(jittered, 1, () => 1)).toBe(1250);
    expect(computeDelay(jittered, 6, () => 1)).toBe(37500);
  });
});

describe('ResilienceExecutor', () => {
  const config: RetryConfig = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, multiplier: 2, jitter: false };

  function executor(threshold = 10) {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const breakers = new CircuitBreakerRegistry({ threshold, timeoutMs: 60000 });
    return { sleep, breakers, exec: new ResilienceExecutor(config, breakers, { sleep }) };
  }

  it('retries transient failures with backoff', async () => {
    const { sleep, exec } = executor();
    const onRetry = vi.fn();
    const fn = vi.fn()
      .mockRejectedValueOnce(networkError())
      .mockRejectedValueOnce(networkError())
      .mockResolvedValueOnce('done');

    await expect(exec.execute('openai', fn, { onRetry })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(fn.mock.calls.map(call => call[0])).toEqual([1, 2, 3]);
    expect(sleep.mock.calls.map(call => call[0])).toEqual([100, 200]);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('does not retry non-retryable errors', async () => {
    const { sleep, exec } = executor();
    const auth = new ProviderError('auth', 'API error (status 401): bad key', { provider: 'openai', status: 401 });
    const fn = vi.fn().mockRejectedValue(auth);

    await expect(exec.execute('openai', fn)).rejects.toBe(auth);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('never calls the provider more than maxAttempts times', async () => {
    const { exec } = executor();
    const fn = vi.fn().mockRejectedValue(networkError());

    await expect(exec.execute('openai', fn)).rejects.toThrow('connection reset');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('checks the circuit breaker on every attempt', async () => {
    const { exec, breakers } = executor(2);
    const fn = vi.fn().mockRejectedValue(networkError());

    await expect(exec.execute('openai', fn)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(breakers.get('openai').getState()).toBe('open');
  });

  it('stops before the first attempt when the signal is already aborted', async () => {
    const { exec } = executor();
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockResolvedValue('never');

    await expect(exec.execute('openai', fn, { signal: controller.signal })).rejects.toMatchObject({ kind: 'cancelled' });
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('isRetryableError', () => {
  it('classifies by kind, flag and message', () => {
    expect(isRetryableError(networkError())).toBe(true);
    expect(isRetryableError(new ProviderError('validation', 'bad model', { provider: 'openai' }))).toBe(false);
    expect(isRetryableError(new CircuitOpenError('openai', 1000))).toBe(false);
    expect(isRetryableError(new Error('Service Unavailable'))).toBe(true);
    expect(isRetryableError(new Error('unexpected token'))).toBe(false);
  });
});
