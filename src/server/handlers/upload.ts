/**
 * Upload Handler - stores the executable, opens a new session log and starts gdb on it
 */
import type { Request, Response } from 'express';
import type { DebuggerEngine } from '../debugger/engine.js';
import { SessionLogger, type SessionLogHolder } from '../services/session-log.js';
import type { UploadStore } from '../services/uploads.js';
import { sendError } from './errors.js';

export interface UploadHandlerDeps {
  engine: DebuggerEngine;
  uploads: UploadStore;
  sessionLog: SessionLogHolder;
  logDir: string;
}

export async function handleUpload(req: Request, res: Response, deps: UploadHandlerDeps): Promise<void> {
  const filename = req.get('x-filename');
  if (!filename) {
    res.status(400).json({ error: 'Invalid request', message: 'X-Filename header is required' });
    return;
  }
  // express.raw leaves req.body as {} when the content type did not match
  const body: unknown = req.body;
  if (!Buffer.isBuffer(body) || body.length === 0) {
    res.status(400).json({ error: 'Invalid request', message: 'Request body must be the executable (application/octet-stream)' });
    return;
  }

  try {
    const stored = await deps.uploads.save(filename, body);

    await deps.sessionLog.replace(SessionLogger.open(deps.logDir));
    const log = deps.sessionLog.current();
    log?.logEvent('INFO', 'file.upload', 'Executable uploaded', {
      'file.name': stored.filename,
      'file.path': stored.filepath,
      'file.size': stored.size,
    });

    await deps.engine.start(stored.filepath);
    log?.logEvent('INFO', 'gdb.start', 'GDB started', { 'gdb.executable': stored.filepath });

    res.json({
      success: true,
      filename: stored.filename,
      filepath: stored.filepath,
      sessionId: log?.sessionId,
    });
  } catch (error) {
    deps.sessionLog.current()?.logError(error, 'Handling upload');
    sendError(res, error);
  }
}
