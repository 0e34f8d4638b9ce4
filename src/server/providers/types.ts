import type { HistoryMessage, ProviderId } from '../types/chat.js';

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface SendOptions {
  model: string;
  messages: HistoryMessage[];
  systemPrompt?: string;
  maxTokens?: number;
  // Ask for a JSON object where the wire format supports it
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ProviderReply {
  text: string;
  usage?: TokenUsage;
}

export interface ProviderClient {
  readonly id: ProviderId;
  send(options: SendOptions): Promise<ProviderReply>;
}

export interface ProviderClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}
