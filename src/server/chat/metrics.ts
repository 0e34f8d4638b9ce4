/**
 * Per-provider request counters
 */
import type { ProviderId } from '../types/chat.js';

export interface ProviderMetrics {
  requests: number;
  errors: number;
  retries: number;
  cacheHits: number;
  cacheMisses: number;
  responses: number;
  averageLatencyMs: number;
  inputTokens: number;
  outputTokens: number;
}

export interface MetricsSnapshot {
  uptimeMs: number;
  global: ProviderMetrics;
  providers: Partial<Record<ProviderId, ProviderMetrics>>;
}

function emptyMetrics(): ProviderMetrics {
  return {
    requests: 0,
    errors: 0,
    retries: 0,
    cacheHits: 0,
    cacheMisses: 0,
    responses: 0,
    averageLatencyMs: 0,
    inputTokens: 0,
    outputTokens: 0,
  };
}

type Counter = 'requests' | 'errors' | 'retries' | 'cacheHits' | 'cacheMisses';

export class MetricsCollector {
  private providers = new Map<ProviderId, ProviderMetrics>();
  private global = emptyMetrics();
  private readonly startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  recordRequest(provider: ProviderId): void {
    this.increment(provider, 'requests');
  }

  recordError(provider: ProviderId): void {
    this.increment(provider, 'errors');
  }

  recordRetry(provider: ProviderId): void {
    this.increment(provider, 'retries');
  }

  recordCacheHit(provider: ProviderId): void {
    this.increment(provider, 'cacheHits');
  }

  recordCacheMiss(provider: ProviderId): void {
    this.increment(provider, 'cacheMisses');
  }

  recordResponse(provider: ProviderId, latencyMs: number, usage?: { inputTokens: number; outputTokens: number }): void {
    for (const metrics of [this.forProvider(provider), this.global]) {
      metrics.responses++;
      // running mean over all responses
      metrics.averageLatencyMs += (latencyMs - metrics.averageLatencyMs) / metrics.responses;
      if (usage) {
        metrics.inputTokens += usage.inputTokens;
        metrics.outputTokens += usage.outputTokens;
      }
    }
  }

  getProviderMetrics(provider: ProviderId): ProviderMetrics {
    return { ...this.forProvider(provider) };
  }

  snapshot(): MetricsSnapshot {
    const providers: Partial<Record<ProviderId, ProviderMetrics>> = {};
    for (const [id, metrics] of this.providers) {
      providers[id] = { ...metrics };
    }
    return { uptimeMs: this.now() - this.startedAt, global: { ...this.global }, providers };
  }

  private increment(provider: ProviderId, counter: Counter): void {
    this.forProvider(provider)[counter]++;
    this.global[counter]++;
  }

  private forProvider(provider: ProviderId): ProviderMetrics {
    let metrics = this.providers.get(provider);
    if (!metrics) {
      metrics = emptyMetrics();
      this.providers.set(provider, metrics);
    }
    return metrics;
  }
}
