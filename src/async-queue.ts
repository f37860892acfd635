interface Waiter<T> {
  resolve(result: IteratorResult<T>): void;
  reject(error: unknown): void;
}

/**
 * Unbounded single-consumer channel. Producers `push` without waiting; the
 * consumer pulls with `for await`. Once closed, queued items still drain and
 * then iteration ends.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | undefined;

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.items.length;
  }

  push(value: T): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value, done: false });
      return;
    }
    this.items.push({ value });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  /** Ends iteration with `error` once queued items have drained. */
  fail(error: unknown): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.reject(error);
    } else {
      this.failure = { error };
    }
    this.close();
  }

  next(): Promise<IteratorResult<T>> {
    const head = this.items.shift();
    if (head) {
      return Promise.resolve({ value: head.value, done: false });
    }
    if (this.closed) {
      const failure = this.failure;
      if (failure) {
        this.failure = undefined;
        return Promise.reject(failure.error);
      }
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
