// This module combines a caller cancellation signal with a per-call timeout into one abort scope.

export type AbortCause = 'timeout' | 'cancelled';

export interface AbortScope {
  signal: AbortSignal;
  // Why this scope aborted, or null while it is live; an interrupted body read may reject with any error type.
  cause: () => AbortCause | null;
  dispose: () => void;
}

// This helper creates one controller that aborts on timeout or when the parent signal aborts.
export function createAbortScope(parent: AbortSignal | undefined, timeoutMs: number): AbortScope {
  const controller = new AbortController();
  let didTimeOut = false;

  const timer = setTimeout(() => {
    didTimeOut = true;
    controller.abort();
  }, timeoutMs);

  const onParentAbort = (): void => controller.abort();
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    cause: () => {
      if (!controller.signal.aborted) {
        return null;
      }
      return didTimeOut ? 'timeout' : 'cancelled';
    },
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  };
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}
