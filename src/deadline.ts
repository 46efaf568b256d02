// Speaker Match - Deadlines
// Runs one async task under an optional timeout and an optional parent
// AbortSignal. Whichever fires first aborts the task's own signal (so the SDK
// call is cancelled) and rejects; a late result from the task is ignored.

import { ScoringTimeoutError } from "./errors.js";

export interface DeadlineOptions {
  /** Milliseconds before the task is abandoned. Omit for no timeout. */
  timeoutMs?: number;
  /** Parent cancellation, e.g. the request-wide deadline. */
  signal?: AbortSignal;
}

function reasonOf(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error(`Aborted: ${String(reason)}`);
}

export function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions = {},
): Promise<T> {
  const { timeoutMs, signal: parent } = options;

  if (parent?.aborted) {
    return Promise.reject(reasonOf(parent));
  }

  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | null = null;

    const onParentAbort = () => {
      if (parent) fail(reasonOf(parent));
    };

    const finish = () => {
      settled = true;
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    };

    const fail = (error: Error) => {
      if (settled) return;
      finish();
      controller.abort(error);
      reject(error);
    };

    if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
      timer = setTimeout(() => {
        fail(new ScoringTimeoutError(`Scoring timed out after ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);
    }
    parent?.addEventListener("abort", onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (err) {
      fail(err instanceof Error ? err : new Error(String(err)));
      return;
    }

    pending.then(
      (value) => {
        if (settled) return;
        finish();
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        finish();
        reject(error);
      },
    );
  });
}
