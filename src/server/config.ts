// ============================================================================
// BACKEND CONFIGURATION
// Server-side configuration with environment variable overrides
// ============================================================================

import { homedir } from 'node:os';
import { join } from 'node:path';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function floatFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseFloat(raw);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function boolFromEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw === '1' || raw.toLowerCase() === 'true';
}

// ============================================================================
// SERVER CONFIGURATION
// ============================================================================

export const SERVER_CONFIG = {
  port: intFromEnv('PORT', 8080),
  host: process.env.HOST || 'localhost',

  // Timeouts (in milliseconds)
  timeout: intFromEnv('SERVER_TIMEOUT_MS', 180000), // 3 minutes, above the chat deadline
  keepAliveTimeout: intFromEnv('KEEP_ALIVE_TIMEOUT_SEC', 65) * 1000,
  headersTimeout: intFromEnv('HEADERS_TIMEOUT_SEC', 66) * 1000,
  shutdownGraceMs: intFromEnv('SHUTDOWN_GRACE_MS', 5000),
} as const;

// ============================================================================
// DEBUGGER CONFIGURATION
// ============================================================================

export const GDB_CONFIG = {
  path: process.env.GDB_PATH || 'gdb',
  captureTimeoutMs: intFromEnv('GDB_CAPTURE_TIMEOUT_MS', 2000),
  captureLockTimeoutMs: intFromEnv('GDB_CAPTURE_LOCK_TIMEOUT_MS', 10000),
  stopGraceMs: intFromEnv('GDB_STOP_GRACE_MS', 3000),
  subscriberBuffer: intFromEnv('GDB_SUBSCRIBER_BUFFER', 100),
} as const;

// ============================================================================
// CHAT ORCHESTRATION CONFIGURATION
// ============================================================================

export const CHAT_CONFIG = {
  requestTimeoutMs: intFromEnv('CHAT_REQUEST_TIMEOUT_MS', 120000),
  providerTimeoutMs: intFromEnv('PROVIDER_TIMEOUT_MS', 30000),
  maxTokens: intFromEnv('CHAT_MAX_TOKENS', 4096),
  reformatEnabled: boolFromEnv('CHAT_REFORMAT_ENABLED', true),

  retry: {
    maxAttempts: intFromEnv('RETRY_MAX_ATTEMPTS', 3),
    baseDelayMs: intFromEnv('RETRY_BASE_DELAY_MS', 1000),
    maxDelayMs: intFromEnv('RETRY_MAX_DELAY_MS', 30000),
    multiplier: floatFromEnv('RETRY_BACKOFF_MULTIPLIER', 2),
    jitter: boolFromEnv('RETRY_JITTER', true),
  },

  circuitBreaker: {
    threshold: intFromEnv('CIRCUIT_BREAKER_THRESHOLD', 5),
    timeoutMs: intFromEnv('CIRCUIT_BREAKER_TIMEOUT_MS', 30000),
  },

  cache: {
    enabled: boolFromEnv('CHAT_CACHE_ENABLED', false),
    ttlMs: intFromEnv('CHAT_CACHE_TTL_MS', 60 * 60 * 1000),
    maxSize: intFromEnv('CHAT_CACHE_MAX_SIZE', 1000),
  },

  context: {
    enabled: boolFromEnv('CHAT_CONTEXT_ENABLED', false),
    maxTokens: intFromEnv('CHAT_CONTEXT_MAX_TOKENS', 4000),
    priorityRecentMessages: intFromEnv('CHAT_CONTEXT_PRIORITY_RECENT', 10),
    compressionThreshold: intFromEnv('CHAT_CONTEXT_COMPRESSION_THRESHOLD', 100),
  },
} as const;

// ============================================================================
// PROVIDER ENDPOINTS
// ============================================================================

export const PROVIDER_CONFIG = {
  anthropic: {
    baseUrl: process.env.ANTHROPIC_BASE_URL || 'https://api.anthropic.com',
  },
  openai: {
    baseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com',
  },
  openrouter: {
    baseUrl: process.env.OPENROUTER_BASE_URL || 'https://openrouter.ai/api',
    referer: process.env.OPENROUTER_REFERER || 'http://localhost:8080',
    title: process.env.OPENROUTER_TITLE || 'gdb-assist',
  },
} as const;

// ============================================================================
// STORAGE CONFIGURATION
// ============================================================================

export const STORAGE_CONFIG = {
  uploadDir: process.env.UPLOAD_DIR || './uploads',
  logDir: process.env.SESSION_LOG_DIR || './logs',
  maxUploadBytes: intFromEnv('MAX_UPLOAD_BYTES', 10 * 1024 * 1024),
  settingsFile: process.env.SETTINGS_FILE || join(homedir(), '.gdb-assist-settings.json'),
} as const;

// ============================================================================
// RATE LIMITING CONFIGURATION
// ============================================================================

export const RATE_LIMIT_CONFIG = {
  windowMs: intFromEnv('RATE_LIMIT_WINDOW_MS', 60000), // 1 minute
  maxRequests: intFromEnv('RATE_LIMIT_MAX_REQUESTS', 30),
  cleanupIntervalMs: intFromEnv('RATE_LIMIT_CLEANUP_MS', 300000), // 5 minutes
} as const;
