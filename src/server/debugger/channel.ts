/**
 * Bounded line channel for one live-output subscriber.
 *
 * `push` never blocks: when the buffer is full the line is dropped and
 * counted. Consumers read with `for await`.
 */
export class LineChannel implements AsyncIterable<string> {
  private buffer: string[] = [];
  private waiting: ((result: IteratorResult<string>) => void) | undefined;
  private closed = false;
  private droppedCount = 0;

  constructor(private readonly capacity: number) {}

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Returns false when the line was dropped.
   */
  push(line: string): boolean {
    if (this.closed) return false;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve({ value: line, done: false });
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      this.droppedCount++;
      return false;
    }
    this.buffer.push(line);
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<string>> {
    const line = this.buffer.shift();
    if (line !== undefined) {
      return Promise.resolve({ value: line, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => {
      this.waiting = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<string> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
