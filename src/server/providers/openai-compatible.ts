/**
 * Providers O and R: chat-completions wire format
 * POST /v1/chat/completions with a bearer token; system prompt as a leading message
 */
import type { ProviderId } from '../types/chat.js';
import { errorForAbortedSignal } from './abort.js';
import { ProviderError, errorFromStatus } from './errors.js';
import type { FetchLike, ProviderClient, ProviderClientOptions, ProviderReply, SendOptions } from './types.js';

const DEFAULT_TIMEOUT_MS = 30000;

interface CompletionMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

interface CompletionRequest {
  model: string;
  messages: CompletionMessage[];
  response_format?: { type: 'json_object' };
}

interface CompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number };
}

export interface OpenAICompatibleOptions extends ProviderClientOptions {
  id: Extract<ProviderId, 'openai' | 'openrouter'>;
  baseUrl: string;
  extraHeaders?: Record<string, string>;
  supportsJsonMode: boolean;
}

export class OpenAICompatibleProvider implements ProviderClient {
  readonly id: Extract<ProviderId, 'openai' | 'openrouter'>;
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly extraHeaders: Record<string, string>;
  private readonly supportsJsonMode: boolean;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAICompatibleOptions) {
    this.id = options.id;
    this.apiKey = options.apiKey;
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/v1/chat/completions`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.extraHeaders = options.extraHeaders ?? {};
    this.supportsJsonMode = options.supportsJsonMode;
    this.fetchImpl = options.fetch ?? fetch;
  }

  buildRequest(options: SendOptions): CompletionRequest {
    const messages: CompletionMessage[] = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    for (const msg of options.messages) {
      messages.push({ role: msg.role, content: msg.content });
    }

    // maxTokens is not sent: some models reject max_tokens
    const body: CompletionRequest = { model: options.model, messages };
    if (options.jsonMode && this.supportsJsonMode) {
      body.response_format = { type: 'json_object' };
    }
    return body;
  }

  async send(options: SendOptions): Promise<ProviderReply> {
    const timeoutSignal = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal;

    let response: Response;
    let rawBody: string;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
          ...this.extraHeaders,
        },
        body: JSON.stringify(this.buildRequest(options)),
        signal,
      });
      // the body can still fail or time out after the headers arrive
      rawBody = await response.text();
    } catch (error) {
      throw this.transportError(error, options.signal, timeoutSignal);
    }

    if (!response.ok) {
      throw errorFromStatus(this.id, response.status, rawBody);
    }

    let data: CompletionResponse;
    try {
      data = JSON.parse(rawBody);
    } catch (error) {
      throw new ProviderError('model', `${this.id} returned a non-JSON body`, { provider: this.id, cause: error });
    }

    const content = data.choices?.[0]?.message?.content;
    if (typeof content !== 'string' || content === '') {
      throw new ProviderError('model', `No content in ${this.id} response`, { provider: this.id });
    }

    return {
      text: content,
      usage: data.usage
        ? { inputTokens: data.usage.prompt_tokens ?? 0, outputTokens: data.usage.completion_tokens ?? 0 }
        : undefined,
    };
  }

  private transportError(error: unknown, callerSignal: AbortSignal | undefined, timeoutSignal: AbortSignal): ProviderError {
    if (callerSignal?.aborted) {
      return errorForAbortedSignal(this.id, callerSignal, error);
    }
    if (timeoutSignal.aborted) {
      return new ProviderError('timeout', `${this.id} request timed out after ${this.timeoutMs}ms`, {
        provider: this.id,
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError('network', `${this.id} network error: ${message}`, { provider: this.id, cause: error });
  }
}
