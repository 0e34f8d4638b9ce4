/**
 * Provider clients - one `send` capability per provider id
 */
import { PROVIDER_CONFIG } from '../config.js';
import type { ProviderId } from '../types/chat.js';
import { AnthropicProvider } from './anthropic.js';
import { ProviderError } from './errors.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import type { FetchLike, ProviderClient } from './types.js';

export type { ProviderClient, ProviderReply, SendOptions, TokenUsage, FetchLike } from './types.js';
export { ProviderError, CircuitOpenError, isRetryableError } from './errors.js';
export type { ProviderErrorKind } from './errors.js';

export interface ProviderCredentials {
  provider: ProviderId;
  apiKey: string;
}

export interface ProviderFactoryOptions {
  timeoutMs?: number;
  fetch?: FetchLike;
}

export type ProviderFactory = (credentials: ProviderCredentials) => ProviderClient;

export function createProviderClient(
  credentials: ProviderCredentials,
  options: ProviderFactoryOptions = {}
): ProviderClient {
  if (!credentials.apiKey) {
    throw new ProviderError('validation', 'API key is not configured', {
      provider: credentials.provider,
      retryable: false,
    });
  }

  const common = { apiKey: credentials.apiKey, timeoutMs: options.timeoutMs, fetch: options.fetch };

  switch (credentials.provider) {
    case 'anthropic':
      return new AnthropicProvider({ ...common, baseUrl: PROVIDER_CONFIG.anthropic.baseUrl });
    case 'openai':
      return new OpenAICompatibleProvider({
        ...common,
        id: 'openai',
        baseUrl: PROVIDER_CONFIG.openai.baseUrl,
        supportsJsonMode: true,
      });
    case 'openrouter':
      return new OpenAICompatibleProvider({
        ...common,
        id: 'openrouter',
        baseUrl: PROVIDER_CONFIG.openrouter.baseUrl,
        extraHeaders: {
          'HTTP-Referer': PROVIDER_CONFIG.openrouter.referer,
          'X-Title': PROVIDER_CONFIG.openrouter.title,
        },
        // Many routed models reject response_format; the prompt carries the JSON contract
        supportsJsonMode: false,
      });
  }
}

export function providerFactory(options: ProviderFactoryOptions = {}): ProviderFactory {
  return credentials => createProviderClient(credentials, options);
}
