/**
 * Unbounded, order-preserving async queue for unsolicited notifications.
 *
 * The receive path pushes without ever waiting; consumers pull with
 * `for await`. Once ended, buffered items are still handed out, then the
 * iterator reports done forever.
 */
export class BroadcastStream<T extends object> implements AsyncIterableIterator<T> {
  private buffer: T[] = [];
  private waiters: ((result: IteratorResult<T, undefined>) => void)[] = [];
  private ended = false;

  push(item: T): void {
    if (this.ended) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
  }

  /** Stop accepting items and release everyone waiting. */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /**
   * Called when a `for await` loop exits early. Detaches that consumer only;
   * the stream keeps buffering for the next one.
   */
  return(): Promise<IteratorResult<T, undefined>> {
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isEnded(): boolean {
    return this.ended;
  }
}
