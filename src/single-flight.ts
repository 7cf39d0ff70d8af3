/**
 * Per-key request coalescing
 *
 * The first caller for a key starts the work; callers arriving while it is
 * pending share the same promise and therefore the same result or error.
 * The key is released once the promise settles, so a later call starts fresh.
 */

export interface FlightResult<T> {
  promise: Promise<T>;
  /** true when the caller joined work started by someone else */
  shared: boolean;
}

export class SingleFlight<T> {
  private pending = new Map<string, Promise<T>>();

  /**
   * Join the in-flight call for `key`, or start `work` if there is none.
   * The check and the registration happen in the same synchronous turn.
   */
  run(key: string, work: () => Promise<T>): FlightResult<T> {
    const existing = this.pending.get(key);
    if (existing) {
      return { promise: existing, shared: true };
    }

    const promise = work().finally(() => {
      if (this.pending.get(key) === promise) {
        this.pending.delete(key);
      }
    });

    this.pending.set(key, promise);
    return { promise, shared: false };
  }

  async do(key: string, work: () => Promise<T>): Promise<T> {
    return this.run(key, work).promise;
  }

  has(key: string): boolean {
    return this.pending.has(key);
  }

  get size(): number {
    return this.pending.size;
  }
}
