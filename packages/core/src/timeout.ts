import { CancellationError } from "./errors.js";

/**
 * Run `operation` with its own AbortSignal, linked to `parent` and to a
 * timer. On timeout the operation's signal is aborted and the promise
 * rejects with `onTimeout()`; on parent abort it rejects with a
 * CancellationError. The operation is expected to stop cooperatively.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent: AbortSignal,
  onTimeout: () => Error
): Promise<T> {
  if (parent.aborted) {
    throw new CancellationError("Cancelled before start", { cause: parent.reason });
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = onTimeout();
      controller.abort(err);
      reject(err);
    }, timeoutMs);

    onParentAbort = () => {
      const err = new CancellationError("Cancelled", { cause: parent.reason });
      controller.abort(err);
      reject(err);
    };
    parent.addEventListener("abort", onParentAbort, { once: true });
  });

  try {
    return await Promise.race([operation(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) parent.removeEventListener("abort", onParentAbort);
  }
}

/** Throw a CancellationError if `signal` has been aborted. */
export function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new CancellationError("Cancelled", { cause: signal.reason });
  }
}
