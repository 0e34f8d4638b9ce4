/**
 * Debugger Handlers - lifecycle, free-form commands and the live output stream
 */
import type { Request, Response } from 'express';
import type { DebuggerEngine } from '../debugger/engine.js';
import type { SessionLogHolder } from '../services/session-log.js';
import type { UploadStore } from '../services/uploads.js';
import { sendError } from './errors.js';
import { createSSEWriter } from './sse.js';

export interface DebuggerHandlerDeps {
  engine: DebuggerEngine;
  uploads: UploadStore;
  sessionLog: SessionLogHolder;
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

export async function handleStart(req: Request, res: Response, deps: DebuggerHandlerDeps): Promise<void> {
  const path = nonEmpty(req.body?.path) ?? deps.uploads.lastUpload?.filepath;
  if (!path) {
    res.status(400).json({ error: 'Invalid request', message: 'No executable uploaded and no path given' });
    return;
  }

  try {
    await deps.engine.start(path);
    deps.sessionLog.current()?.logEvent('INFO', 'gdb.start', 'GDB started', { 'gdb.executable': path });
    res.json({ success: true, status: deps.engine.status() });
  } catch (error) {
    deps.sessionLog.current()?.logError(error, 'Starting GDB');
    sendError(res, error);
  }
}

export async function handleStop(_req: Request, res: Response, deps: DebuggerHandlerDeps): Promise<void> {
  try {
    await deps.engine.stop();
    deps.sessionLog.current()?.logEvent('INFO', 'gdb.stop', 'GDB stopped');
    res.json({ success: true, status: deps.engine.status() });
  } catch (error) {
    sendError(res, error);
  }
}

export function handleCommand(req: Request, res: Response, deps: DebuggerHandlerDeps): void {
  const command = nonEmpty(req.body?.command);
  if (command === undefined) {
    res.status(400).json({ error: 'Invalid request', message: 'command must be a non-empty string' });
    return;
  }

  try {
    deps.engine.sendLine(command);
    deps.sessionLog.current()?.logCommand(command, 'user');
    res.json({ success: true });
  } catch (error) {
    sendError(res, error);
  }
}

export function handleStatus(_req: Request, res: Response, deps: DebuggerHandlerDeps): void {
  res.json(deps.engine.status());
}

/**
 * Server-sent events: one `output` event per debugger line until the client leaves.
 */
export async function handleOutputStream(_req: Request, res: Response, deps: DebuggerHandlerDeps): Promise<void> {
  const sse = createSSEWriter(res);
  const channel = deps.engine.subscribe();
  res.on('close', () => deps.engine.unsubscribe(channel));

  try {
    sse.sendEvent('status', { running: deps.engine.isRunning() });
    for await (const line of channel) {
      if (sse.isDisconnected()) break;
      sse.sendEvent('output', { line });
    }
  } catch (error) {
    if (!sse.isDisconnected()) {
      console.warn(`[Debugger] Output stream failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  } finally {
    deps.engine.unsubscribe(channel);
    sse.endResponse();
  }
}
