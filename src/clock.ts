import { JobCancelledError } from "./errors.js";

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolvePromise, reject) => {
      if (signal?.aborted) {
        reject(new JobCancelledError());
        return;
      }

      const onAbort = () => {
        clearTimeout(timer);
        reject(new JobCancelledError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolvePromise();
      }, Math.max(0, ms));
      signal?.addEventListener("abort", onAbort, { once: true });
    })
};

export function randomBetween(minMs: number, maxMs: number): number {
  if (maxMs <= minMs) {
    return minMs;
  }
  return minMs + Math.random() * (maxMs - minMs);
}
