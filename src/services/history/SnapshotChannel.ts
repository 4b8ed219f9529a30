/**
 * SnapshotChannel — push-to-pull bridge for store subscriptions.
 *
 * The store pushes snapshots (or errors) in the order it emits them; the
 * consumer iterates with `for await`. close() ends iteration, drops anything
 * still buffered and runs the store's teardown once.
 */

export type ChannelEvent<T> = { ok: true; value: T } | { ok: false; error: Error };

type Waiter<T> = (result: IteratorResult<ChannelEvent<T>, undefined>) => void;

export class SnapshotChannel<T> implements AsyncIterable<ChannelEvent<T>> {
  private buffer: ChannelEvent<T>[] = [];
  private waiting: Waiter<T> | null = null;
  private closed = false;

  constructor(private readonly teardown: () => void | Promise<void> = () => {}) {}

  get isClosed(): boolean {
    return this.closed;
  }

  push(value: T): void {
    this.deliver({ ok: true, value });
  }

  fail(error: Error): void {
    this.deliver({ ok: false, error });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.buffer = [];
    const waiting = this.waiting;
    this.waiting = null;
    waiting?.({ value: undefined, done: true });
    await this.teardown();
  }

  [Symbol.asyncIterator](): AsyncIterator<ChannelEvent<T>, undefined> {
    return {
      next: () => {
        const event = this.buffer.shift();
        if (event) return Promise.resolve({ value: event, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise<IteratorResult<ChannelEvent<T>, undefined>>((resolve) => {
          this.waiting = resolve;
        });
      },
      return: async () => {
        await this.close();
        return { value: undefined, done: true };
      },
    };
  }

  private deliver(event: ChannelEvent<T>): void {
    if (this.closed) return;
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
  }
}
