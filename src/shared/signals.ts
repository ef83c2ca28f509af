/**
 * A signal derived from a parent and bounded by a timeout. `dispose` clears
 * the timer and detaches from the parent; it is safe to call more than once.
 */
export interface DerivedSignal {
  signal: AbortSignal;
  dispose(): void;
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * 処理名: deriveSignal（派生シグナル生成）
 * 処理概要: 親シグナルの中断とタイムアウトのどちらかで中断される子シグナルを作ります。
 *          タイムアウト時の reason は {@link TimeoutError} です。
 * 実装理由: サーバの終了と1件ごとの処理期限を、ハンドラからは1つのシグナルとして観測させる為です。
 */
export function deriveSignal(parent: AbortSignal | undefined, timeoutMs?: number): DerivedSignal {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | null = null;

  const onParentAbort = () => controller.abort(parent?.reason);

  const dispose = () => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
    parent?.removeEventListener('abort', onParentAbort);
  };

  if (parent?.aborted) {
    controller.abort(parent.reason);
    return { signal: controller.signal, dispose };
  }
  parent?.addEventListener('abort', onParentAbort, { once: true });

  if (timeoutMs !== undefined) {
    timer = setTimeout(() => {
      timer = null;
      controller.abort(new TimeoutError(timeoutMs));
    }, timeoutMs);
  }

  return { signal: controller.signal, dispose };
}

/**
 * Subscribe to abort, invoking the listener right away when the signal is
 * already aborted. Returns the unsubscribe function.
 */
export function onAbort(signal: AbortSignal | undefined, listener: () => void): () => void {
  if (!signal) return () => {};
  if (signal.aborted) {
    listener();
    return () => {};
  }
  signal.addEventListener('abort', listener, { once: true });
  return () => signal.removeEventListener('abort', listener);
}
