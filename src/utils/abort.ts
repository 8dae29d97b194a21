import { StreamingError } from '../errors.js';

/**
 * Derive a signal that aborts when `signal` does or after `timeoutMs`, whichever is
 * first. `didTimeout()` tells the two apart once the derived signal has fired.
 */
export function withTimeoutSignal(options: { signal?: AbortSignal; timeoutMs: number }): {
  signal: AbortSignal;
  didTimeout: () => boolean;
  cleanup: () => void;
} {
  const { signal, timeoutMs } = options;
  const controller = new AbortController();
  let timedOut = false;

  const propagateAbort = () => {
    controller.abort(signal?.reason);
  };

  if (signal) {
    if (signal.aborted) {
      propagateAbort();
    } else {
      signal.addEventListener('abort', propagateAbort, { once: true });
    }
  }

  let timer: NodeJS.Timeout | null = null;
  if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new StreamingError('connect_timeout', `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    timer.unref?.();
  }

  return {
    signal: controller.signal,
    didTimeout: () => timedOut,
    cleanup: () => {
      if (timer) clearTimeout(timer);
      if (signal) {
        signal.removeEventListener('abort', propagateAbort);
      }
    },
  };
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts. A value that arrives after
 * the abort is handed to `onLate` so the caller can release it.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal, onLate?: (value: T) => void): Promise<T> {
  if (signal.aborted) {
    void promise.then((value) => onLate?.(value), () => undefined);
    return Promise.reject(abortReason(signal));
  }
  return new Promise<T>((resolve, reject) => {
    let aborted = false;
    const onAbort = () => {
      aborted = true;
      reject(abortReason(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        if (aborted) {
          onLate?.(value);
        } else {
          resolve(value);
        }
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

function abortReason(signal: AbortSignal): Error {
  const { reason } = signal;
  if (reason instanceof Error) return reason;
  return new StreamingError('aborted', typeof reason === 'string' ? reason : 'operation aborted');
}
