import { CancelledError, TimeoutError } from './errors.js';

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new CancelledError();
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw abortReason(signal);
}

/**
 * Resolve after `ms`, or reject with the signal's reason as soon as it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `task` with a child signal that aborts after `timeoutMs` (TimeoutError)
 * or when `parent` aborts (parent's reason). The task's promise is raced
 * against the child signal so a task that ignores the signal cannot hang.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent: AbortSignal,
  label: string,
): Promise<T> {
  throwIfAborted(parent);
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(abortReason(parent));
  parent.addEventListener('abort', onParentAbort, { once: true });
  const timer = setTimeout(
    () => controller.abort(new TimeoutError(`${label} timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(abortReason(controller.signal)), {
      once: true,
    });
  });
  // The race below may settle first; keep the loser from surfacing as unhandled.
  aborted.catch(() => undefined);

  try {
    return await Promise.race([task(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent.removeEventListener('abort', onParentAbort);
  }
}
