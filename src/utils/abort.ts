/**
 * Per-operation abort signal: fires on timeout or when the caller's signal aborts
 */
export interface ScopedSignal {
  readonly signal: AbortSignal;
  timedOut(): boolean;
  clear(): void;
}

export function createScopedSignal(
  timeoutMs: number,
  parent?: AbortSignal,
): ScopedSignal {
  const controller = new AbortController();
  let didTimeOut = false;

  const onParentAbort = (): void => controller.abort(parent?.reason);

  const timer = setTimeout(() => {
    didTimeOut = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => didTimeOut,
    clear: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
