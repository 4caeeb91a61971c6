// Bound an abortable async operation by a deadline and, optionally, a parent signal.

export interface TimeoutOptions {
  timeoutMs: number;
  onTimeout: () => Error;
  onAbort?: () => Error;
  signal?: AbortSignal;
}

export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, onTimeout, onAbort, signal }: TimeoutOptions,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(onAbort ? onAbort() : onTimeout());
      return;
    }

    let settled = false;
    const finish = (action: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', abortListener);
      action();
    };

    const timer = setTimeout(() => {
      finish(() => {
        controller.abort();
        reject(onTimeout());
      });
    }, timeoutMs);

    const abortListener = () => {
      finish(() => {
        controller.abort();
        reject(onAbort ? onAbort() : onTimeout());
      });
    };
    signal?.addEventListener('abort', abortListener, { once: true });

    fn(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error)),
    );
  });
}
