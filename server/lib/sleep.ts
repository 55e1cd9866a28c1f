import { FetchAbortedError } from './errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal | null) => Promise<void>;

/** Resolves after `ms`; rejects with FetchAbortedError as soon as `signal` aborts. */
export const sleepWithAbort: SleepFn = (ms, signal) => {
  const waitMs = Math.max(0, Math.ceil(Number(ms) || 0));
  return new Promise((resolve, reject) => {
    let settled = false;
    const done = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      fn();
    };
    const onAbort = () => done(() => reject(new FetchAbortedError('Aborted while waiting')));
    const timer = setTimeout(() => done(resolve), waitMs);
    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
};
