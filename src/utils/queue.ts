export type QueueResult<item> =
  | { type: "item"; item: item }
  | { type: "closed" }
  | { type: "timeout" };

/**
 * Unbounded multi-producer, single-consumer queue.
 *
 * Producers `push` synchronously; the consumer awaits `next` or
 * `nextWithin`. Once closed, pushes are refused and the consumer drains
 * whatever is left before observing `closed`.
 */
export class AsyncQueue<item> {
  #items: { value: item }[] = [];
  #closed = false;
  #waiter: ((result: QueueResult<item>) => void) | undefined;

  get size(): number {
    return this.#items.length;
  }

  get closed(): boolean {
    return this.#closed;
  }

  /** Returns `false` when the queue is closed. */
  push(item: item): boolean {
    if (this.#closed) return false;
    const waiter = this.#waiter;
    if (waiter) {
      this.#waiter = undefined;
      waiter({ type: "item", item });
    } else {
      this.#items.push({ value: item });
    }
    return true;
  }

  close(): void {
    if (this.#closed) return;
    this.#closed = true;
    const waiter = this.#waiter;
    this.#waiter = undefined;
    waiter?.({ type: "closed" });
  }

  /** Takes the next item without waiting. */
  tryShift(): item | undefined {
    return this.#items.shift()?.value;
  }

  next(): Promise<QueueResult<item>> {
    return this.#wait();
  }

  /** Like `next`, giving up with a `timeout` result after `ms` milliseconds. */
  nextWithin(ms: number): Promise<QueueResult<item>> {
    return this.#wait(ms);
  }

  #wait(ms?: number): Promise<QueueResult<item>> {
    const head = this.#items.shift();
    if (head) return Promise.resolve({ type: "item", item: head.value });
    if (this.#closed) return Promise.resolve({ type: "closed" });
    if (this.#waiter) throw new Error("AsyncQueue supports a single consumer.");

    return new Promise((resolve) => {
      const timeoutId =
        ms === undefined
          ? undefined
          : setTimeout(() => {
              this.#waiter = undefined;
              resolve({ type: "timeout" });
            }, ms);
      this.#waiter = (result) => {
        clearTimeout(timeoutId);
        resolve(result);
      };
    });
  }
}
