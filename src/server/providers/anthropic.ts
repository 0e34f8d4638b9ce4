/**
 * Provider A: Anthropic Messages API
 * POST /v1/messages, system prompt in its own field
 */
import Anthropic from '@anthropic-ai/sdk';
import type { HistoryMessage } from '../types/chat.js';
import { errorForAbortedSignal } from './abort.js';
import { ProviderError, errorFromStatus } from './errors.js';
import type { ProviderClient, ProviderClientOptions, ProviderReply, SendOptions } from './types.js';

const DEFAULT_MAX_TOKENS = 4096;

function toMessageParams(messages: HistoryMessage[]): Anthropic.MessageParam[] {
  // The Messages API only knows user and assistant turns; summaries travel as user notes
  return messages.map(msg => ({
    role: msg.role === 'assistant' ? 'assistant' : 'user',
    content: msg.role === 'system' ? `[Note] ${msg.content}` : msg.content,
  }));
}

export class AnthropicProvider implements ProviderClient {
  readonly id = 'anthropic' as const;
  private client: Anthropic;

  constructor(options: ProviderClientOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      // Retries are owned by the resilience layer
      maxRetries: 0,
      ...(options.fetch ? { fetch: options.fetch } : {}),
    });
  }

  async send(options: SendOptions): Promise<ProviderReply> {
    let message: Anthropic.Message;

    try {
      message = await this.client.messages.create(
        {
          model: options.model,
          max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
          messages: toMessageParams(options.messages),
          ...(options.systemPrompt ? { system: options.systemPrompt } : {}),
        },
        { signal: options.signal }
      );
    } catch (error) {
      throw this.translateError(error, options.signal);
    }

    const textBlock = message.content.find(
      (block): block is Anthropic.TextBlock => block.type === 'text'
    );
    if (!textBlock) {
      throw new ProviderError('model', 'No text content in Anthropic response', { provider: this.id });
    }

    return {
      text: textBlock.text,
      usage: {
        inputTokens: message.usage.input_tokens,
        outputTokens: message.usage.output_tokens,
      },
    };
  }

  private translateError(error: unknown, signal: AbortSignal | undefined): ProviderError {
    if (error instanceof ProviderError) return error;

    if (signal?.aborted) {
      return errorForAbortedSignal(this.id, signal, error);
    }
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return new ProviderError('timeout', 'Anthropic request timed out', { provider: this.id, cause: error });
    }
    if (error instanceof Anthropic.APIUserAbortError) {
      return new ProviderError('cancelled', 'Anthropic request was aborted', { provider: this.id, cause: error });
    }
    if (error instanceof Anthropic.APIConnectionError) {
      return new ProviderError('network', `Anthropic connection error: ${error.message}`, {
        provider: this.id,
        cause: error,
      });
    }
    if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
      return errorFromStatus(this.id, error.status, error.message);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError('internal', `Anthropic request failed: ${message}`, { provider: this.id, cause: error });
  }
}
