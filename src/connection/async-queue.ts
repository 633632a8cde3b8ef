/**
 * Push-driven async iterator. Producers `push` items, consumers pull them
 * with `next()` or `for await`. Items pushed before `end()` are still
 * delivered; `return()` drops them.
 */
export class AsyncQueue<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private readonly waiting: Array<(result: IteratorResult<T>) => void> = [];
  private ended = false;

  /** @param onEnd - invoked once when the queue ends, by `end()` or `return()`. */
  constructor(private readonly onEnd?: () => void) {}

  get isEnded(): boolean {
    return this.ended;
  }

  /** @returns `false` if the queue has already ended and the item was dropped. */
  push(item: T): boolean {
    if (this.ended) return false;
    const resolve = this.waiting.shift();
    if (resolve) resolve({ value: item, done: false });
    else this.buffer.push(item);
    return true;
  }

  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.onEnd?.();
    for (const resolve of this.waiting.splice(0)) {
      resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length) {
      const [item] = this.buffer.splice(0, 1);
      return Promise.resolve({ value: item, done: false });
    }
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  return(): Promise<IteratorResult<T>> {
    this.buffer.length = 0;
    this.end();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
