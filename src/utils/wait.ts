import { TimeoutError } from "../errors.js";

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  backoff?: number; // multiplier applied to the interval after each miss
  maxIntervalMs?: number;
  signal?: AbortSignal;
  label?: string;
}

/**
 * Re-checks `check` until it returns true. The first check runs immediately.
 * Throws TimeoutError once `timeoutMs` has elapsed without success.
 */
export async function pollUntil(
  check: () => boolean | Promise<boolean>,
  opts: PollOptions
): Promise<void> {
  const deadline = Date.now() + opts.timeoutMs;
  const factor = opts.backoff ?? 1;
  const cap = opts.maxIntervalMs ?? opts.intervalMs;
  let interval = opts.intervalMs;

  while (true) {
    if (await check()) return;
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw new TimeoutError(
        `Timed out after ${opts.timeoutMs}ms waiting for ${opts.label ?? "condition"}`
      );
    }
    await sleep(Math.min(interval, remaining), opts.signal);
    interval = Math.min(interval * factor, cap);
  }
}

/**
 * Runs `work` with a signal that aborts once `timeoutMs` elapses or the
 * parent `signal` aborts, and waits for the work to settle before returning.
 * An elapsed deadline surfaces as TimeoutError.
 */
export async function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  opts: { timeoutMs: number; label: string; signal?: AbortSignal }
): Promise<T> {
  const deadline = AbortSignal.timeout(opts.timeoutMs);
  const signal = opts.signal ? AbortSignal.any([opts.signal, deadline]) : deadline;
  try {
    return await work(signal);
  } catch (err) {
    if (deadline.aborted && !opts.signal?.aborted) {
      throw new TimeoutError(`Timed out after ${opts.timeoutMs}ms waiting for ${opts.label}`, {
        cause: err,
      });
    }
    throw err;
  }
}
