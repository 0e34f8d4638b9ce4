/**
 * Chat request/response shapes shared by the orchestrator, providers and handlers
 */

export const PROVIDER_IDS = ['anthropic', 'openai', 'openrouter'] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

export function isProviderId(value: unknown): value is ProviderId {
  return PROVIDER_IDS.some(id => id === value);
}

// 'system' only appears after the context manager folds old history into a summary
export type MessageRole = 'user' | 'assistant' | 'system';

export interface HistoryMessage {
  role: MessageRole;
  content: string;
}

export interface ContextItem {
  type: string;
  description: string;
  content?: string;
}

export interface ChatRequest {
  message: string;
  history: HistoryMessage[];
  sentContext: ContextItem[];
}

/**
 * The JSON object the model is asked to return
 */
export interface ActionBlock {
  text: string;
  commands: string[];
  waitForOutput: boolean;
}

export type ParseMethod = 'full_json' | 'fenced_json' | 'extracted_json' | 'fallback';

export interface ParsedResponse extends ActionBlock {
  method: ParseMethod;
  raw: string;
}

export interface ChatResult {
  response: string;
  executedCommands: string[];
  combinedOutput: string;
  fromCache?: boolean;
}
