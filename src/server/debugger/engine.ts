/**
 * Debugger Engine - owns the single gdb subprocess
 *
 * stdout and stderr are merged into one line stream. Every line is fanned
 * out to live subscribers (dropped for a subscriber whose buffer is full)
 * and, while a capture window is open, appended to the capture buffer.
 *
 * Capture is time-bounded: gdb prints no reliable end-of-output marker, so
 * `executeWithCapture` returns whatever arrived within the window.
 */
import { spawn, type SpawnOptions } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import { access, constants } from 'node:fs/promises';
import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { LineChannel } from './channel.js';
import { DebuggerCancelledError, DebuggerNotRunningError, DebuggerStartError, DebuggerTimeoutError } from './errors.js';
import { Mutex } from './mutex.js';

export const EXIT_LINE = '[GDB has exited]';

export interface DebuggerProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => DebuggerProcess;

export interface DebuggerEngineOptions {
  gdbPath: string;
  captureTimeoutMs: number;
  captureLockTimeoutMs: number;
  stopGraceMs: number;
  subscriberBuffer: number;
  spawn?: SpawnFn;
  /** Skip the executable existence check (tests drive a fake process). */
  skipExecutableCheck?: boolean;
}

export interface DebuggerStatus {
  running: boolean;
  pid: number | undefined;
  executable: string | undefined;
  startedAt: string | undefined;
  subscribers: number;
}

interface ActiveSession {
  child: DebuggerProcess;
  executable: string;
  startedAt: Date;
  readers: Interface[];
  exited: Promise<void>;
}

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

export class DebuggerEngine {
  private session: ActiveSession | undefined;
  private running = false;
  private capture: string[] | undefined;
  private readonly captureLock = new Mutex();
  private readonly subscribers = new Set<LineChannel>();
  private lifecycle: Promise<void> = Promise.resolve();
  private readonly spawnProcess: SpawnFn;

  constructor(private readonly options: DebuggerEngineOptions) {
    this.spawnProcess = options.spawn ?? defaultSpawn;
  }

  isRunning(): boolean {
    return this.running;
  }

  status(): DebuggerStatus {
    return {
      running: this.running,
      pid: this.session?.child.pid,
      executable: this.session?.executable,
      startedAt: this.session?.startedAt.toISOString(),
      subscribers: this.subscribers.size,
    };
  }

  /**
   * Start gdb on `executablePath`. A running session is stopped first.
   */
  start(executablePath: string): Promise<void> {
    return this.serialize(async () => {
      if (this.session) {
        await this.stopSession();
      }

      if (!this.options.skipExecutableCheck) {
        try {
          await access(executablePath, constants.R_OK);
        } catch (error) {
          throw new DebuggerStartError(`Executable not found: ${executablePath}`, { cause: error });
        }
      }

      console.log(`[Debugger] Starting ${this.options.gdbPath} on ${executablePath}`);
      const child = this.spawnProcess(this.options.gdbPath, ['-q', executablePath], {
        stdio: ['pipe', 'pipe', 'pipe'],
        detached: true,
      });

      const { stdin, stdout, stderr } = child;
      if (!stdin || !stdout || !stderr) {
        child.kill('SIGKILL');
        throw new DebuggerStartError('Failed to open pipes to the debugger');
      }

      await new Promise<void>((resolve, reject) => {
        const onSpawn = () => {
          child.off('error', onError);
          resolve();
        };
        const onError = (error: Error) => {
          child.off('spawn', onSpawn);
          reject(new DebuggerStartError(`Failed to start ${this.options.gdbPath}: ${error.message}`, { cause: error }));
        };
        child.once('spawn', onSpawn);
        child.once('error', onError);
      });

      stdin.on('error', (error: Error) => {
        console.warn(`[Debugger] stdin error: ${error.message}`);
      });
      child.on('error', (error: Error) => {
        console.error('[Debugger] Process error:', error);
      });

      const readers = [stdout, stderr].map(stream => {
        const reader = createInterface({ input: stream, crlfDelay: Infinity });
        reader.on('line', (line: string) => this.handleLine(line));
        return reader;
      });

      const exited = new Promise<void>(resolve => {
        child.once('close', (code: unknown, signal: unknown) => {
          console.log(`[Debugger] Process exited (code: ${String(code)}, signal: ${String(signal)})`);
          this.handleExit(child);
          resolve();
        });
      });

      this.session = { child, executable: executablePath, startedAt: new Date(), readers, exited };
      this.running = true;
      console.log(`[Debugger] Started (pid: ${child.pid ?? 'unknown'})`);
    });
  }

  stop(): Promise<void> {
    return this.serialize(() => this.stopSession());
  }

  sendLine(line: string): void {
    const stdin = this.writableStdin();
    stdin.write(`${line}\n`);
  }

  /**
   * Run `command` and return the lines printed during the capture window.
   * Overlapping calls run one at a time; their buffers never share a line.
   */
  async executeWithCapture(
    command: string,
    timeoutMs: number = this.options.captureTimeoutMs,
    signal?: AbortSignal
  ): Promise<string> {
    if (!this.running) {
      throw new DebuggerNotRunningError();
    }

    const release = await this.captureLock.acquire(this.options.captureLockTimeoutMs, signal);
    if (!release) {
      if (signal?.aborted) throw new DebuggerCancelledError(command);
      throw new DebuggerTimeoutError(command, this.options.captureLockTimeoutMs);
    }

    try {
      const session = this.session;
      if (!this.running || !session) {
        throw new DebuggerNotRunningError();
      }

      this.capture = [];
      this.sendLine(command);
      await this.captureWindow(timeoutMs, session.exited, signal);
      return this.capture.join('\n');
    } finally {
      this.capture = undefined;
      release();
    }
  }

  /**
   * Live output. Subscriptions outlive restarts; close the channel or call
   * `unsubscribe` to release it.
   */
  subscribe(): LineChannel {
    const channel = new LineChannel(this.options.subscriberBuffer);
    this.subscribers.add(channel);
    return channel;
  }

  unsubscribe(channel: LineChannel): void {
    channel.close();
    this.subscribers.delete(channel);
  }

  async shutdown(): Promise<void> {
    await this.stop();
    for (const channel of this.subscribers) {
      channel.close();
    }
    this.subscribers.clear();
  }

  private serialize(task: () => Promise<void>): Promise<void> {
    const run = this.lifecycle.then(task);
    // the chain only orders tasks; each caller gets its own failure through `run`
    this.lifecycle = run.catch(() => undefined);
    return run;
  }

  private writableStdin(): Writable {
    const stdin = this.session?.child.stdin;
    if (!this.running || !stdin || stdin.destroyed) {
      throw new DebuggerNotRunningError();
    }
    return stdin;
  }

  private captureWindow(timeoutMs: number, exited: Promise<void>, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
      const finish = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', finish);
        resolve();
      };
      const timer = setTimeout(finish, timeoutMs);
      signal?.addEventListener('abort', finish, { once: true });
      if (signal?.aborted) finish();
      exited.then(finish, finish);
    });
  }

  private handleLine(line: string): void {
    this.capture?.push(line);
    this.broadcast(line);
  }

  private broadcast(line: string): void {
    for (const channel of this.subscribers) {
      if (channel.isClosed) {
        this.subscribers.delete(channel);
        continue;
      }
      channel.push(line);
    }
  }

  private handleExit(child: DebuggerProcess): void {
    if (this.session?.child !== child) return;
    for (const reader of this.session.readers) {
      reader.close();
    }
    this.running = false;
    this.broadcast(`\n${EXIT_LINE}`);
  }

  private async stopSession(): Promise<void> {
    const session = this.session;
    if (!session) return;

    const { child, exited } = session;
    console.log(`[Debugger] Stopping (pid: ${child.pid ?? 'unknown'})`);

    if (this.running && child.stdin && !child.stdin.destroyed) {
      child.stdin.write('quit\n');
      // answers gdb's "Quit anyway? (y or n)" while an inferior is live
      child.stdin.write('y\n');
    }

    const exitedInTime = await this.waitFor(exited, this.options.stopGraceMs);
    if (!exitedInTime) {
      console.warn(`[Debugger] Did not exit within ${this.options.stopGraceMs}ms, killing process group`);
      this.killGroup(child);
      await this.waitFor(exited, this.options.stopGraceMs);
    }

    child.stdin?.end();
    for (const reader of session.readers) {
      reader.close();
    }
    this.running = false;
    this.session = undefined;
    console.log('[Debugger] Stopped');
  }

  private killGroup(child: DebuggerProcess): void {
    if (child.pid !== undefined) {
      try {
        process.kill(-child.pid, 'SIGKILL');
        return;
      } catch (error) {
        console.warn(`[Debugger] Process group kill failed, killing pid only: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    child.kill('SIGKILL');
  }

  private waitFor(done: Promise<void>, ms: number): Promise<boolean> {
    return new Promise(resolve => {
      const timer = setTimeout(() => resolve(false), ms);
      done.then(() => {
        clearTimeout(timer);
        resolve(true);
      }, () => {
        clearTimeout(timer);
        resolve(false);
      });
    });
  }
}
