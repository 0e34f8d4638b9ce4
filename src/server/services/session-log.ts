/**
 * Session log - append-only JSON Lines file, one per uploaded executable
 */
import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import type { ChatRequest } from '../types/chat.js';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export type LogDetails = Record<string, unknown>;

export class SessionLogger {
  private stream: WriteStream;
  private closed = false;

  private constructor(
    readonly sessionId: string,
    readonly filePath: string
  ) {
    this.stream = createWriteStream(filePath, { flags: 'a', mode: 0o644 });
    this.stream.on('error', (error) => {
      console.error(`[SessionLog] Write failed for ${filePath}:`, error);
    });
  }

  static open(logDir: string, sessionId: string = uuidv4()): SessionLogger {
    mkdirSync(logDir, { recursive: true });
    const filePath = join(logDir, `${sessionId}.log`);
    console.log(`[SessionLog] Session log started: ${filePath}`);
    return new SessionLogger(sessionId, filePath);
  }

  logEvent(level: LogLevel, eventType: string, message: string, details: LogDetails = {}): void {
    if (this.closed) {
      console.warn(`[SessionLog] Dropping ${eventType} event for closed session ${this.sessionId}`);
      return;
    }

    const entry = {
      timestamp: new Date().toISOString(),
      level,
      'session.id': this.sessionId,
      'event.type': eventType,
      message,
      ...details,
    };
    this.stream.write(`${JSON.stringify(entry)}\n`);
  }

  logUserChat(request: ChatRequest): void {
    const details: LogDetails = { 'user.message': request.message, 'user.history.length': request.history.length };
    if (request.sentContext.length > 0) {
      details['user.context'] = request.sentContext;
    }
    this.logEvent('INFO', 'user.input', 'User submitted chat message', details);
  }

  logLLMRequest(provider: string, model: string, turn: string, fullMessage: string): void {
    this.logEvent('INFO', 'llm.request', 'Sending request to LLM', {
      'llm.provider': provider,
      'llm.model': model,
      'llm.turn': turn,
      'llm.request.message': fullMessage,
    });
  }

  logLLMResponse(turn: string, response: string, parseMethod?: string): void {
    this.logEvent('INFO', 'llm.response', 'Received response from LLM', {
      'llm.turn': turn,
      'llm.response.body': response,
      ...(parseMethod ? { 'llm.response.parse_method': parseMethod } : {}),
    });
  }

  logCommand(command: string, source: 'llm' | 'user'): void {
    this.logEvent('INFO', 'gdb.command', 'Sending command to GDB', { 'gdb.command': command, 'gdb.source': source });
  }

  logDebuggerOutput(command: string, output: string): void {
    this.logEvent('INFO', 'gdb.output', 'Received output from GDB', { 'gdb.command': command, 'gdb.output': output });
  }

  logError(error: unknown, context: string): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logEvent('ERROR', 'error', context, {
      'error.message': message,
      ...(error instanceof Error && error.stack ? { 'error.stack': error.stack } : {}),
    });
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    console.log(`[SessionLog] Closing session log: ${this.filePath}`);
    return new Promise(resolve => {
      this.stream.end(() => resolve());
    });
  }
}

/**
 * Holds the one active session logger; replacing it closes the previous file.
 */
export class SessionLogHolder {
  private logger: SessionLogger | undefined;

  current(): SessionLogger | undefined {
    return this.logger;
  }

  async replace(next: SessionLogger): Promise<void> {
    const previous = this.logger;
    this.logger = next;
    if (previous) {
      await previous.close();
    }
  }

  async close(): Promise<void> {
    const previous = this.logger;
    this.logger = undefined;
    if (previous) {
      await previous.close();
    }
  }
}
