export type FetchImpl = typeof fetch;

export interface Deadline {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Abort signal that fires after `timeoutMs` or when `parent` aborts.
 * Call `dispose` once the request settles so no timer outlives it.
 */
export function withDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    const reason = new Error(`timed out after ${timeoutMs}ms`);
    reason.name = 'TimeoutError';
    controller.abort(reason);
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) onParentAbort();
    else parent.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

export async function safeReadBody(res: Response): Promise<string> {
  try {
    const text = await res.text();
    return text ? ` - ${text.slice(0, 200)}` : '';
  } catch {
    return '';
  }
}
