/**
 * Single-consumer push channel. Values pushed before iteration starts are
 * buffered; `close` ends iteration once the buffer drains. It can be iterated
 * only once, and breaking out of the loop runs `onReturn`.
 */
export class AsyncChannel<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private resolve: (() => void) | null = null;
  private closed = false;
  private iterated = false;

  constructor(private readonly onReturn?: () => void) {}

  push(value: T): void {
    if (this.closed) {
      return;
    }
    this.queue.push(value);
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  private wake(): void {
    if (this.resolve) {
      this.resolve();
      this.resolve = null;
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterated) {
      throw new Error("channel can only be iterated once");
    }
    this.iterated = true;
    let finished = false;
    try {
      while (true) {
        const next = this.queue.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }
        if (this.closed) {
          finished = true;
          return;
        }
        await new Promise<void>((r) => {
          this.resolve = r;
        });
      }
    } finally {
      this.queue.length = 0;
      this.closed = true;
      if (!finished) {
        this.onReturn?.();
      }
    }
  }
}
