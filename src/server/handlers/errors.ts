import type { Response } from 'express';
import { DebuggerNotRunningError } from '../debugger/errors.js';
import { CircuitOpenError, ProviderError } from '../providers/errors.js';

export interface ErrorBody {
  error: string;
  message: string;
}

export function errorResponse(error: unknown): { status: number; body: ErrorBody } {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof CircuitOpenError) {
    return { status: 503, body: { error: 'Service unavailable', message } };
  }
  if (error instanceof ProviderError) {
    // a remote 4xx carries a status and is the provider's failure, not the caller's
    if (error.kind === 'validation' && error.status === undefined) {
      return { status: 400, body: { error: 'Invalid request', message } };
    }
    return { status: 502, body: { error: 'Provider error', message } };
  }
  if (error instanceof DebuggerNotRunningError) {
    return { status: 409, body: { error: 'Debugger not running', message } };
  }
  return { status: 500, body: { error: 'Internal server error', message } };
}

export function sendError(res: Response, error: unknown): void {
  const { status, body } = errorResponse(error);
  if (status >= 500) {
    console.error(`[Server] ${body.error}:`, error);
  }
  res.status(status).json(body);
}
