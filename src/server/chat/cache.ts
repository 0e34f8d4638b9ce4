/**
 * Response cache keyed by request fingerprint, with TTL and LRU eviction
 */
import { createHash } from 'node:crypto';
import type { ChatRequest, ChatResult, ProviderId } from '../types/chat.js';

export interface CacheConfig {
  enabled: boolean;
  ttlMs: number;
  maxSize: number;
}

interface CacheEntry {
  response: ChatResult;
  createdAt: number;
  expiresAt: number;
  accessCount: number;
  lastAccessed: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  hitRate: number;
}

/**
 * Deterministic digest over the parts of a request that shape the answer.
 */
export function fingerprintRequest(request: ChatRequest): string {
  const hashData = {
    message: request.message,
    history: request.history.map(msg => ({ role: msg.role, content: msg.content })),
    sentContext: request.sentContext.map(item => ({
      type: item.type,
      description: item.description,
      content: item.content ?? '',
    })),
  };
  return createHash('sha256').update(JSON.stringify(hashData)).digest('hex').slice(0, 16);
}

export function cacheKey(provider: ProviderId, model: string, request: ChatRequest): string {
  return `${provider}:${model}:${fingerprintRequest(request)}`;
}

export class ResponseCache {
  // Map iteration order doubles as recency order: first key is least recently used
  private entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private sweepTimer: NodeJS.Timeout | undefined;

  constructor(
    private readonly config: CacheConfig,
    private readonly now: () => number = Date.now
  ) {}

  isEnabled(): boolean {
    return this.config.enabled;
  }

  get(key: string): ChatResult | undefined {
    if (!this.config.enabled) return undefined;

    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    const now = this.now();
    if (now >= entry.expiresAt) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    entry.accessCount++;
    entry.lastAccessed = now;
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;

    return { ...structuredClone(entry.response), fromCache: true };
  }

  set(key: string, response: ChatResult): void {
    if (!this.config.enabled) return;

    if (this.entries.has(key)) {
      this.entries.delete(key);
    }
    while (this.entries.size >= this.config.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }

    const now = this.now();
    const { fromCache: _fromCache, ...stored } = response;
    this.entries.set(key, {
      response: structuredClone(stored),
      createdAt: now,
      expiresAt: now + this.config.ttlMs,
      accessCount: 1,
      lastAccessed: now,
    });
  }

  /**
   * Drop expired entries. Returns how many were removed.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  startSweeper(): void {
    if (!this.config.enabled || this.sweepTimer) return;
    const interval = Math.max(1000, Math.floor(this.config.ttlMs / 4));
    this.sweepTimer = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) {
        console.log(`[Cache] Swept ${removed} expired entries`);
      }
    }, interval);
    this.sweepTimer.unref();
  }

  stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      hitRate: total > 0 ? (this.hits / total) * 100 : 0,
    };
  }
}
