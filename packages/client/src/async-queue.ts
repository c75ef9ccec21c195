type Resolver<T> = (result: IteratorResult<T>) => void;
type Rejecter = (err: unknown) => void;

/**
 * Unbounded push/pull queue. Values pushed before `fail` are still delivered;
 * the failure surfaces once they are drained.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly values: T[] = [];
  private readonly pending: Array<{ resolve: Resolver<T>; reject: Rejecter }> = [];
  private closed = false;
  private failed = false;
  private failure: unknown;

  push(value: T): void {
    if (this.failed) throw this.failure;
    if (this.closed) throw new Error("Cannot push into a closed queue");
    const waiter = this.pending.shift();
    if (waiter) waiter.resolve({ value, done: false });
    else this.values.push(value);
  }

  next(): Promise<IteratorResult<T>> {
    if (this.values.length) {
      const [value] = this.values.splice(0, 1);
      return Promise.resolve<IteratorResult<T>>({ value, done: false });
    }
    if (this.failed) return Promise.reject(this.failure);
    if (this.closed) return Promise.resolve<IteratorResult<T>>({ value: undefined, done: true });
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.pending.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  fail(err: unknown): void {
    if (this.failed || this.closed) return;
    this.failed = true;
    this.failure = err ?? new Error("AsyncQueue failure");
    for (const waiter of this.pending.splice(0)) {
      waiter.reject(this.failure);
    }
  }

  get isSettled(): boolean {
    return this.closed || this.failed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
    };
  }
}
