/** Resolves after `ms`, or early (without rejecting) once `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type Clock = () => number;

/** Monotonic milliseconds. */
export const monotonicNow: Clock = () => performance.now();

export type LinkedSignal = {
  signal: AbortSignal;
  abort(reason?: unknown): void;
  /** Detaches from the source signals; call once the work has settled. */
  unlink(): void;
};

/** Aborts when any of the given signals aborts. */
export function linkSignals(...signals: Array<AbortSignal | undefined>): LinkedSignal {
  const controller = new AbortController();
  const detach: Array<() => void> = [];
  const unlink = () => {
    for (const fn of detach.splice(0)) fn();
  };
  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    const onAbort = () => {
      unlink();
      controller.abort(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    detach.push(() => signal.removeEventListener("abort", onAbort));
  }
  if (controller.signal.aborted) unlink();
  return {
    signal: controller.signal,
    abort: (reason?: unknown) => controller.abort(reason),
    unlink,
  };
}
