/**
 * Context Manager - keeps the estimated prompt size under a token cap
 *
 * Estimates are characters / 4 per text piece. Trimming runs in order and
 * stops as soon as the request fits:
 *   1. fold old history into one summary message (above the compression threshold)
 *   2. drop history down to the most recent `priorityRecentMessages`
 *   3. truncate large context items
 *   4. hard cap: drop remaining history, shorten context items and the message,
 *      then drop context items until the request fits
 */
import type { ChatRequest, ContextItem, HistoryMessage } from '../types/chat.js';

export interface ContextConfig {
  enabled: boolean;
  maxTokens: number;
  priorityRecentMessages: number;
  compressionThreshold: number;
}

export interface ContextResult {
  request: ChatRequest;
  trimmed: boolean;
  originalTokens: number;
  finalTokens: number;
  steps: string[];
}

const CHARS_PER_TOKEN = 4;
const LARGE_ITEM_TOKENS = 500;
const TRUNCATED_ITEM_CHARS = 200;
const TOPIC_CHARS = 50;
const TRUNCATION_MARKER = '... [truncated]';

export function estimateTextTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

export function estimateContextItemTokens(item: ContextItem): number {
  return estimateTextTokens(item.description) + estimateTextTokens(item.content ?? '');
}

export function estimateRequestTokens(request: ChatRequest): number {
  let tokens = estimateTextTokens(request.message);
  for (const msg of request.history) {
    tokens += estimateTextTokens(msg.content);
  }
  for (const item of request.sentContext) {
    tokens += estimateContextItemTokens(item);
  }
  return tokens;
}

/**
 * Cut `content` to about `limit` characters, preferring a word boundary.
 */
export function truncateContent(content: string, limit: number): string {
  if (content.length <= limit) return content;

  let truncated = content.slice(0, limit);
  const lastSpace = truncated.lastIndexOf(' ');
  if (lastSpace > limit / 2) {
    truncated = truncated.slice(0, lastSpace);
  }
  return truncated + TRUNCATION_MARKER;
}

function extractTopic(content: string): string {
  return content.length > TOPIC_CHARS ? `${content.slice(0, TOPIC_CHARS)}...` : content;
}

export function summarizeMessages(messages: HistoryMessage[]): string {
  const userCount = messages.filter(m => m.role === 'user').length;
  const assistantCount = messages.filter(m => m.role === 'assistant').length;
  let summary = `Previous conversation with ${messages.length} messages. `;
  summary += `User asked ${userCount} questions, assistant provided ${assistantCount} responses.`;
  const last = messages[messages.length - 1];
  if (last) {
    summary += ` Last topic: ${extractTopic(last.content)}`;
  }
  return summary;
}

export class ContextManager {
  constructor(private readonly config: ContextConfig) {}

  isEnabled(): boolean {
    return this.config.enabled;
  }

  getConfig(): Readonly<ContextConfig> {
    return this.config;
  }

  process(request: ChatRequest): ContextResult {
    const originalTokens = estimateRequestTokens(request);
    if (!this.config.enabled || originalTokens <= this.config.maxTokens) {
      return { request, trimmed: false, originalTokens, finalTokens: originalTokens, steps: [] };
    }

    const working: ChatRequest = {
      message: request.message,
      history: request.history.map(msg => ({ ...msg })),
      sentContext: request.sentContext.map(item => ({ ...item })),
    };
    const steps: string[] = [];

    if (working.history.length > this.config.compressionThreshold && this.compressHistory(working)) {
      steps.push('compressed_history');
    }
    if (this.overLimit(working) && this.dropOldHistory(working)) {
      steps.push('dropped_history');
    }
    if (this.overLimit(working) && this.truncateLargeItems(working)) {
      steps.push('truncated_context');
    }
    if (this.overLimit(working) && this.enforceHardLimit(working)) {
      steps.push('hard_limit');
    }

    const finalTokens = estimateRequestTokens(working);
    console.log(`[Context] Trimmed request from ~${originalTokens} to ~${finalTokens} tokens (${steps.join(', ')})`);
    return { request: working, trimmed: steps.length > 0, originalTokens, finalTokens, steps };
  }

  private overLimit(request: ChatRequest): boolean {
    return estimateRequestTokens(request) > this.config.maxTokens;
  }

  private compressHistory(request: ChatRequest): boolean {
    const compressCount = request.history.length - this.config.priorityRecentMessages;
    if (compressCount <= 0) return false;

    const summary: HistoryMessage = {
      role: 'system',
      content: `[CONVERSATION SUMMARY: ${summarizeMessages(request.history.slice(0, compressCount))}]`,
    };
    request.history = [summary, ...request.history.slice(compressCount)];
    return true;
  }

  private dropOldHistory(request: ChatRequest): boolean {
    const keep = this.config.priorityRecentMessages;
    if (request.history.length <= keep) return false;
    request.history = keep > 0 ? request.history.slice(-keep) : [];
    return true;
  }

  private truncateLargeItems(request: ChatRequest): boolean {
    const tokensToSave = estimateRequestTokens(request) - this.config.maxTokens;
    let saved = 0;

    // largest first
    const order = request.sentContext
      .map((item, index) => ({ index, tokens: estimateContextItemTokens(item) }))
      .sort((a, b) => b.tokens - a.tokens);

    for (const { index, tokens } of order) {
      if (saved >= tokensToSave || tokens <= LARGE_ITEM_TOKENS) break;
      const item = request.sentContext[index];
      if (item.content === undefined) continue;

      item.content = truncateContent(item.content, TRUNCATED_ITEM_CHARS);
      saved += tokens - estimateContextItemTokens(item);
    }
    return saved > 0;
  }

  private enforceHardLimit(request: ChatRequest): boolean {
    let changed = false;

    if (request.history.length > 0) {
      request.history = [];
      changed = true;
    }

    for (const item of request.sentContext) {
      if (!this.overLimit(request)) return changed;
      if (item.content && item.content.length > TRUNCATED_ITEM_CHARS + TRUNCATION_MARKER.length) {
        item.content = truncateContent(item.content, TRUNCATED_ITEM_CHARS);
        changed = true;
      }
    }

    const excess = estimateRequestTokens(request) - this.config.maxTokens;
    if (excess > 0 && request.message.length > TRUNCATION_MARKER.length) {
      const budgetChars = Math.max(0, request.message.length - (excess + 1) * CHARS_PER_TOKEN - TRUNCATION_MARKER.length);
      request.message = request.message.slice(0, budgetChars) + TRUNCATION_MARKER;
      changed = true;
    }

    // drop context items, oldest first
    while (this.overLimit(request) && request.sentContext.length > 0) {
      request.sentContext.shift();
      changed = true;
    }
    return changed;
  }
}
