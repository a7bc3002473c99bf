import { JobCancelledError } from "./errors.js";

interface Waiter {
  resolve: (id: string) => void;
  reject: (error: Error) => void;
}

/** FIFO handoff of job ids to the worker pool. */
export class JobQueue {
  private readonly items: string[] = [];
  private readonly waiters: Waiter[] = [];

  get size(): number {
    return this.items.length;
  }

  push(id: string): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(id);
      return;
    }
    this.items.push(id);
  }

  take(signal?: AbortSignal): Promise<string> {
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (signal?.aborted) {
      return Promise.reject(new JobCancelledError("Queue wait was cancelled"));
    }

    return new Promise<string>((resolvePromise, reject) => {
      const waiter: Waiter = {
        resolve: (id) => {
          signal?.removeEventListener("abort", onAbort);
          resolvePromise(id);
        },
        reject
      };
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(new JobCancelledError("Queue wait was cancelled"));
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }
}
