/**
 * Unbounded single-consumer message queue.
 *
 * Any number of producers may `send`; exactly one consumer awaits
 * `receive`. Messages are delivered in the order they were sent.
 */
export class Mailbox<T> {
  private readonly queue: T[] = [];
  private waiter: ((message: T) => void) | null = null;

  send(message: T): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(message);
      return;
    }
    this.queue.push(message);
  }

  /**
   * Wait for the next message. Rejects when `signal` aborts first.
   */
  receive(signal?: AbortSignal): Promise<T> {
    if (this.queue.length > 0) {
      const [next] = this.queue.splice(0, 1);
      return Promise.resolve(next);
    }

    if (this.waiter) {
      return Promise.reject(new Error("Mailbox already has a consumer"));
    }

    if (signal?.aborted) {
      return Promise.reject(new Error("Mailbox receive aborted"));
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = null;
        reject(new Error("Mailbox receive aborted"));
      };

      this.waiter = (message: T) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(message);
      };

      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Remove and return every queued message
   */
  drain(): T[] {
    return this.queue.splice(0, this.queue.length);
  }

  get pending(): number {
    return this.queue.length;
  }
}
