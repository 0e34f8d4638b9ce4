import type { Request, Response } from 'express';
import type { ResponseCache } from '../chat/cache.js';
import type { ContextManager } from '../chat/context-manager.js';
import type { MetricsCollector } from '../chat/metrics.js';
import type { DebuggerEngine } from '../debugger/engine.js';
import type { CircuitBreakerRegistry } from '../resilience/circuit-breaker.js';

export interface MetricsHandlerDeps {
  metrics: MetricsCollector;
  breakers: CircuitBreakerRegistry;
  engine: DebuggerEngine;
  cache?: ResponseCache;
  contextManager?: ContextManager;
}

export function handleMetrics(_req: Request, res: Response, deps: MetricsHandlerDeps): void {
  const snapshot = deps.metrics.snapshot();
  res.json({
    timestamp: new Date().toISOString(),
    uptimeMs: snapshot.uptimeMs,
    global: snapshot.global,
    providers: snapshot.providers,
    circuitBreakers: deps.breakers.snapshot(),
    cache: deps.cache?.isEnabled() ? { enabled: true, ...deps.cache.getStats() } : { enabled: false },
    context: deps.contextManager ? { ...deps.contextManager.getConfig() } : { enabled: false },
  });
}

export function handleHealth(_req: Request, res: Response, deps: MetricsHandlerDeps): void {
  res.json({ status: 'ok', debuggerRunning: deps.engine.isRunning() });
}

export function handleCacheClear(_req: Request, res: Response, deps: MetricsHandlerDeps): void {
  deps.cache?.clear();
  console.log('[Cache] Cleared');
  res.json({ success: true, message: 'Cache cleared' });
}
