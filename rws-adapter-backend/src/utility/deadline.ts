import {
  RefreshCancelledError,
  RefreshTimeoutError,
} from "../dataset/errors";

export interface DeadlineOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs `work` with an AbortSignal that fires on timeout or when the caller's
 * signal aborts. The returned promise settles on the first of: work result,
 * timeout, cancellation; whatever `work` produces afterwards is dropped.
 */
export function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new RefreshCancelledError());
      return;
    }

    const stop = (error: Error): void => {
      cleanup();
      controller.abort(error);
      reject(error);
    };
    const onCallerAbort = (): void => stop(new RefreshCancelledError());
    const timer = setTimeout(
      () => stop(new RefreshTimeoutError(options.timeoutMs)),
      options.timeoutMs
    );
    const cleanup = (): void => {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onCallerAbort);
    };

    options.signal?.addEventListener("abort", onCallerAbort, { once: true });

    work(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

/**
 * Waits for a promise that may be shared with other callers, giving up with
 * RefreshCancelledError when this caller's signal aborts. The shared work
 * itself keeps running.
 */
export function untilAborted<T>(
  promise: Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new RefreshCancelledError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new RefreshCancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
