/**
 * Express application - routing only; handlers live in ./handlers
 */
import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import cookieParser from 'cookie-parser';
import type { ResponseCache } from './chat/cache.js';
import type { ContextManager } from './chat/context-manager.js';
import type { MetricsCollector } from './chat/metrics.js';
import type { ChatOrchestrator } from './chat/orchestrator.js';
import type { DebuggerEngine } from './debugger/engine.js';
import { handleChat } from './handlers/chat.js';
import {
  handleCommand,
  handleOutputStream,
  handleStart,
  handleStatus,
  handleStop,
} from './handlers/debugger.js';
import { handleCacheClear, handleHealth, handleMetrics } from './handlers/metrics.js';
import { handleGetSettings, handleSaveSettings, handleTestConnection } from './handlers/settings.js';
import { handleUpload } from './handlers/upload.js';
import { loggerMiddleware } from './middleware/logger.js';
import type { ProviderFactory } from './providers/index.js';
import type { CircuitBreakerRegistry } from './resilience/circuit-breaker.js';
import type { SessionLogHolder } from './services/session-log.js';
import type { SettingsStore } from './services/settings.js';
import type { UploadStore } from './services/uploads.js';

export interface AppDeps {
  orchestrator: ChatOrchestrator;
  engine: DebuggerEngine;
  uploads: UploadStore;
  sessionLog: SessionLogHolder;
  settings: SettingsStore;
  providers: ProviderFactory;
  metrics: MetricsCollector;
  breakers: CircuitBreakerRegistry;
  chatRateLimiter: RequestHandler;
  cache?: ResponseCache;
  contextManager?: ContextManager;
  logDir: string;
  maxUploadBytes: number;
  providerTimeoutMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(cookieParser());
  app.use(loggerMiddleware);

  const json = express.json({ limit: '1mb' });
  const debuggerDeps = { engine: deps.engine, uploads: deps.uploads, sessionLog: deps.sessionLog };
  const metricsDeps = {
    metrics: deps.metrics,
    breakers: deps.breakers,
    engine: deps.engine,
    cache: deps.cache,
    contextManager: deps.contextManager,
  };

  // Chat
  app.post('/api/chat', deps.chatRateLimiter, json, async (req, res) => {
    await handleChat(req, res, deps.orchestrator);
  });

  // Upload: raw executable body, filename in X-Filename
  app.post(
    '/api/upload',
    express.raw({ type: 'application/octet-stream', limit: deps.maxUploadBytes }),
    async (req, res) => {
      await handleUpload(req, res, { ...debuggerDeps, logDir: deps.logDir });
    }
  );

  // Debugger
  app.post('/api/debugger/start', json, async (req, res) => {
    await handleStart(req, res, debuggerDeps);
  });
  app.post('/api/debugger/stop', async (req, res) => {
    await handleStop(req, res, debuggerDeps);
  });
  app.post('/api/debugger/command', json, (req, res) => handleCommand(req, res, debuggerDeps));
  app.get('/api/debugger/status', (req, res) => handleStatus(req, res, debuggerDeps));
  app.get('/api/debugger/output', async (req, res) => {
    await handleOutputStream(req, res, debuggerDeps);
  });

  // Settings
  app.get('/api/settings', (req, res) => handleGetSettings(req, res, deps.settings));
  app.post('/api/settings', json, async (req, res) => {
    await handleSaveSettings(req, res, deps.settings);
  });
  app.post('/api/test-connection', json, async (req, res) => {
    await handleTestConnection(req, res, deps.settings, deps.providers, deps.providerTimeoutMs);
  });

  // Metrics and health
  app.get('/api/metrics', (req, res) => handleMetrics(req, res, metricsDeps));
  app.post('/api/cache/clear', (req, res) => handleCacheClear(req, res, metricsDeps));
  app.get('/health', (req, res) => handleHealth(req, res, metricsDeps));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found', message: 'No such endpoint' });
  });

  // Body parser failures (malformed JSON, oversized upload)
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = isRecord(err) && typeof err.status === 'number' ? err.status : 500;
    const message = err instanceof Error ? err.message : String(err);
    if (status >= 500) {
      console.error('[Server] Unhandled error:', err);
    }
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : 'Invalid request', message });
  });

  return app;
}
