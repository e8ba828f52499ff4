/**
 * Request/response correlation by `requestId`.
 *
 * Every wait has its own timeout. When the connection drops, all waits
 * are rejected at once so nothing is left to time out on a dead socket.
 *
 * @module connection/pending-requests
 */
import { RequestTimeoutError } from "../errors.js";
import type { InboundFrame } from "../protocol/schema.js";

interface Waiter {
  resolve: (frame: InboundFrame) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class PendingRequests {
  private waiters = new Map<string, Waiter>();

  wait(requestId: string, what: string, timeoutMs: number): Promise<InboundFrame> {
    if (this.waiters.has(requestId)) {
      return Promise.reject(new Error(`Duplicate requestId ${requestId}`));
    }
    return new Promise<InboundFrame>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters.delete(requestId);
        reject(new RequestTimeoutError(what, timeoutMs));
      }, timeoutMs);
      this.waiters.set(requestId, { resolve, reject, timer });
    });
  }

  has(requestId: string): boolean {
    return this.waiters.has(requestId);
  }

  resolve(requestId: string, frame: InboundFrame): boolean {
    const waiter = this.take(requestId);
    if (!waiter) return false;
    waiter.resolve(frame);
    return true;
  }

  reject(requestId: string, err: Error): boolean {
    const waiter = this.take(requestId);
    if (!waiter) return false;
    waiter.reject(err);
    return true;
  }

  rejectAll(makeError: () => Error): void {
    const waiters = [...this.waiters.values()];
    for (const waiter of waiters) clearTimeout(waiter.timer);
    this.waiters.clear();
    for (const waiter of waiters) waiter.reject(makeError());
  }

  get size(): number {
    return this.waiters.size;
  }

  private take(requestId: string): Waiter | undefined {
    const waiter = this.waiters.get(requestId);
    if (!waiter) return undefined;
    clearTimeout(waiter.timer);
    this.waiters.delete(requestId);
    return waiter;
  }
}
