/**
 * Chat Handler - validates the request body and runs the orchestrator
 */
import type { Request, Response } from 'express';
import type { ChatOrchestrator } from '../chat/orchestrator.js';
import type { ChatRequest, ContextItem, HistoryMessage } from '../types/chat.js';
import { sendError } from './errors.js';

const MAX_MESSAGE_LENGTH = 100000;

export type ChatValidation =
  | { valid: true; request: ChatRequest }
  | { valid: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toHistoryMessage(value: unknown): HistoryMessage | undefined {
  if (!isRecord(value) || typeof value.content !== 'string') return undefined;
  if (value.role !== 'user' && value.role !== 'assistant') return undefined;
  return { role: value.role, content: value.content };
}

function toContextItem(value: unknown): ContextItem | undefined {
  if (!isRecord(value) || typeof value.type !== 'string' || typeof value.description !== 'string') {
    return undefined;
  }
  if (value.content !== undefined && typeof value.content !== 'string') return undefined;
  return value.content === undefined
    ? { type: value.type, description: value.description }
    : { type: value.type, description: value.description, content: value.content };
}

export function validateChatRequest(body: unknown): ChatValidation {
  if (!isRecord(body)) {
    return { valid: false, error: 'Request body must be a JSON object' };
  }

  const { message } = body;
  if (typeof message !== 'string' || message.trim().length === 0) {
    return { valid: false, error: 'Message cannot be empty' };
  }
  if (message.length > MAX_MESSAGE_LENGTH) {
    return { valid: false, error: `Message too large. Maximum ${MAX_MESSAGE_LENGTH} characters allowed.` };
  }

  const rawHistory = body.history ?? [];
  if (!Array.isArray(rawHistory)) {
    return { valid: false, error: 'history must be an array' };
  }
  const history: HistoryMessage[] = [];
  for (const [index, entry] of rawHistory.entries()) {
    const msg = toHistoryMessage(entry);
    if (!msg) return { valid: false, error: `history[${index}] must be {role: "user"|"assistant", content: string}` };
    history.push(msg);
  }

  const rawContext = body.sentContext ?? [];
  if (!Array.isArray(rawContext)) {
    return { valid: false, error: 'sentContext must be an array' };
  }
  const sentContext: ContextItem[] = [];
  for (const [index, entry] of rawContext.entries()) {
    const item = toContextItem(entry);
    if (!item) return { valid: false, error: `sentContext[${index}] must be {type, description, content?}` };
    sentContext.push(item);
  }

  return { valid: true, request: { message, history, sentContext } };
}

export async function handleChat(req: Request, res: Response, orchestrator: ChatOrchestrator): Promise<void> {
  const validation = validateChatRequest(req.body);
  if (!validation.valid) {
    res.status(400).json({ error: 'Invalid request', message: validation.error });
    return;
  }

  // Client disconnect cancels the orchestration
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) controller.abort();
  });

  const requestId = req.metadata?.request_id ?? 'unknown';
  const startTime = Date.now();
  try {
    const result = await orchestrator.handle(validation.request, controller.signal);
    console.log(`[Chat] Request ${requestId} completed in ${Date.now() - startTime}ms${result.fromCache ? ' (cached)' : ''}`);
    res.json({
      response: result.response,
      executedCommands: result.executedCommands,
      fromCache: result.fromCache === true,
    });
  } catch (error) {
    if (controller.signal.aborted) {
      console.log(`[Chat] Request ${requestId} cancelled by client`);
      return;
    }
    sendError(res, error);
  }
}
