import { ProviderTimeoutError } from "../errors.js";

export type DeadlineOptions = {
  label: string;
  timeoutMs: number;
  signal?: AbortSignal;
};

function abortReason(signal: AbortSignal, label: string): unknown {
  return signal.reason ?? new Error(`${label} aborted`);
}

/**
 * Runs `fn` with its own AbortSignal, aborted when the caller's signal aborts
 * or when `timeoutMs` elapses. Rejects as soon as either happens, even if `fn`
 * ignores the signal.
 */
export async function callWithDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions
): Promise<T> {
  const { label, timeoutMs, signal } = options;
  if (signal?.aborted) {
    throw abortReason(signal, label);
  }

  const controller = new AbortController();
  const onCallerAbort = (): void => {
    if (signal) controller.abort(abortReason(signal, label));
  };
  signal?.addEventListener("abort", onCallerAbort, { once: true });

  const timer = setTimeout(() => {
    controller.abort(new ProviderTimeoutError(label, timeoutMs));
  }, timeoutMs);

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(controller.signal.reason),
      { once: true }
    );
  });

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onCallerAbort);
  }
}
