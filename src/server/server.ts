/**
 * Server entry point - wires the services together and handles shutdown
 */
import 'dotenv/config';
import { ResponseCache } from './chat/cache.js';
import { ContextManager } from './chat/context-manager.js';
import { MetricsCollector } from './chat/metrics.js';
import { ChatOrchestrator } from './chat/orchestrator.js';
import { createApp } from './app.js';
import { CHAT_CONFIG, GDB_CONFIG, RATE_LIMIT_CONFIG, SERVER_CONFIG, STORAGE_CONFIG } from './config.js';
import { DebuggerEngine } from './debugger/engine.js';
import { createRateLimiter } from './middleware/rate-limit.js';
import { providerFactory } from './providers/index.js';
import { CircuitBreakerRegistry } from './resilience/circuit-breaker.js';
import { ResilienceExecutor } from './resilience/retry.js';
import { SessionLogHolder, SessionLogger } from './services/session-log.js';
import { SettingsStore } from './services/settings.js';
import { UploadStore } from './services/uploads.js';

async function init() {
  const settings = new SettingsStore(STORAGE_CONFIG.settingsFile);
  const loaded = await settings.load();
  console.log(`[Server] Settings loaded (provider: ${loaded.provider}, model: ${loaded.model})`);

  const sessionLog = new SessionLogHolder();
  await sessionLog.replace(SessionLogger.open(STORAGE_CONFIG.logDir));

  const engine = new DebuggerEngine({
    gdbPath: GDB_CONFIG.path,
    captureTimeoutMs: GDB_CONFIG.captureTimeoutMs,
    captureLockTimeoutMs: GDB_CONFIG.captureLockTimeoutMs,
    stopGraceMs: GDB_CONFIG.stopGraceMs,
    subscriberBuffer: GDB_CONFIG.subscriberBuffer,
  });

  const breakers = new CircuitBreakerRegistry(CHAT_CONFIG.circuitBreaker);
  const resilience = new ResilienceExecutor(CHAT_CONFIG.retry, breakers);
  const providers = providerFactory({ timeoutMs: CHAT_CONFIG.providerTimeoutMs });
  const metrics = new MetricsCollector();
  const cache = new ResponseCache(CHAT_CONFIG.cache);
  const contextManager = new ContextManager(CHAT_CONFIG.context);
  cache.startSweeper();

  console.log(`[Server] Cache ${cache.isEnabled() ? 'enabled' : 'disabled'}, context management ${contextManager.isEnabled() ? 'enabled' : 'disabled'}`);

  const orchestrator = new ChatOrchestrator(
    { settings, providers, resilience, executor: engine, metrics, sessionLog, cache, contextManager },
    {
      requestTimeoutMs: CHAT_CONFIG.requestTimeoutMs,
      maxTokens: CHAT_CONFIG.maxTokens,
      captureTimeoutMs: GDB_CONFIG.captureTimeoutMs,
      reformatEnabled: CHAT_CONFIG.reformatEnabled,
    }
  );

  const rateLimiter = createRateLimiter(RATE_LIMIT_CONFIG);

  const app = createApp({
    orchestrator,
    engine,
    uploads: new UploadStore(STORAGE_CONFIG.uploadDir),
    sessionLog,
    settings,
    providers,
    metrics,
    breakers,
    chatRateLimiter: rateLimiter.middleware,
    cache,
    contextManager,
    logDir: STORAGE_CONFIG.logDir,
    maxUploadBytes: STORAGE_CONFIG.maxUploadBytes,
    providerTimeoutMs: CHAT_CONFIG.providerTimeoutMs,
  });

  const cleanup = async () => {
    await engine.shutdown();
    cache.stopSweeper();
    rateLimiter.stop();
    await sessionLog.close();
  };

  return { app, cleanup };
}

// Start server
init().then(({ app, cleanup }) => {
  const server = app.listen(SERVER_CONFIG.port, SERVER_CONFIG.host, () => {
    console.log(`[Server] Running on http://${SERVER_CONFIG.host}:${SERVER_CONFIG.port}`);
  });

  server.timeout = SERVER_CONFIG.timeout;
  server.keepAliveTimeout = SERVER_CONFIG.keepAliveTimeout;
  server.headersTimeout = SERVER_CONFIG.headersTimeout;

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[Server] ${signal} received, shutting down gracefully...`);

    const closed = new Promise<void>(resolve => server.close(() => resolve()));
    server.closeIdleConnections();

    // live output streams hold their connections open until cut
    const forceClose = setTimeout(() => {
      console.warn(`[Server] Connections still open after ${SERVER_CONFIG.shutdownGraceMs}ms, closing them`);
      server.closeAllConnections();
    }, SERVER_CONFIG.shutdownGraceMs);

    await closed;
    clearTimeout(forceClose);
    console.log('[Server] HTTP server closed');

    await cleanup();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      console.error('[Server] Shutdown failed:', error);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}).catch((error) => {
  console.error('[FATAL] Server initialization failed:', error);
  process.exit(1);
});
