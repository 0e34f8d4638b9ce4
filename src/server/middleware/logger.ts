import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { RequestMetadata } from '../types/logging.js';

// Extend Express Request type to include metadata
declare global {
  namespace Express {
    interface Request {
      metadata?: RequestMetadata;
    }
  }
}

const SESSION_COOKIE = 'session_id';
const SESSION_MAX_AGE_MS = 24 * 60 * 60 * 1000;

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function loggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  // Generate or retrieve session ID from cookie/header
  const cookie: unknown = req.cookies?.[SESSION_COOKIE];
  let sessionId = (typeof cookie === 'string' && cookie) || firstHeader(req.headers['x-session-id']);

  if (!sessionId) {
    sessionId = uuidv4();
    res.cookie(SESSION_COOKIE, sessionId, {
      maxAge: SESSION_MAX_AGE_MS,
      httpOnly: true,
      sameSite: 'strict',
    });
  }

  // Extract IP address (handle proxies)
  const ip = (
    firstHeader(req.headers['x-forwarded-for']) ||
    firstHeader(req.headers['x-real-ip']) ||
    req.socket.remoteAddress ||
    'unknown'
  ).split(',')[0].trim();

  const requestId = firstHeader(req.headers['x-request-id']) || uuidv4();
  res.setHeader('X-Request-Id', requestId);

  req.metadata = {
    session_id: sessionId,
    ip_address: ip,
    user_agent: req.headers['user-agent'] || 'unknown',
    request_id: requestId,
  };

  next();
}
