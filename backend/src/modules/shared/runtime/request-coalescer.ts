/**
 * REQUEST COALESCER
 * =================
 *
 * Single-flight: concurrent calls for the same key share one promise.
 *
 * If 10 requests ask for the same image simultaneously:
 * - Only 1 actual download happens
 * - All 10 callers await the same promise
 *
 * The key is released before any caller observes the result, so a call
 * made after settlement always starts a fresh attempt.
 */

export class RequestCoalescer<T> {
  private inflight = new Map<string, Promise<T>>();

  /**
   * Run a function with coalescing.
   * If the same key is already running, return the existing promise.
   */
  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) {
      return existing;
    }

    const p = (async () => {
      try {
        return await fn();
      } finally {
        this.inflight.delete(key);
      }
    })();

    this.inflight.set(key, p);
    return p;
  }

  isInFlight(key: string): boolean {
    return this.inflight.has(key);
  }

  size(): number {
    return this.inflight.size;
  }

  keys(): string[] {
    return Array.from(this.inflight.keys());
  }
}
