import type { Response } from 'express';

export type SSEWriter = {
  sendEvent: (event: string, data: unknown) => void;
  endResponse: () => void;
  isDisconnected: () => boolean;
};

export function createSSEWriter(res: Response): SSEWriter {
  let clientDisconnected = false;
  res.on('close', () => { clientDisconnected = true; });

  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.flushHeaders();

  return {
    sendEvent: (event: string, data: unknown) => {
      if (!res.writable) throw new Error('AbortError: Client disconnected');
      res.write(`event: ${event}\n`);
      res.write(`data: ${JSON.stringify(data)}\n\n`);
    },
    endResponse: () => {
      if (!res.writable) return;
      res.end();
    },
    isDisconnected: () => clientDisconnected
  };
}
