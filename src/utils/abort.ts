import { logger } from './logger.js';

/** Resolves after `ms`, or rejects with `onAbort()` as soon as the signal fires. */
export function sleep(ms: number, signal?: AbortSignal, onAbort: () => Error = () => new Error('Aborted')): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(onAbort());
      return;
    }
    const abort = (): void => {
      clearTimeout(timer);
      reject(onAbort());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', abort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', abort, { once: true });
  });
}

export interface DeadlineOptions {
  timeoutMs: number;
  signal: AbortSignal;
  onTimeout: () => Error;
  onAbort: () => Error;
}

/**
 * Run `task` with its own AbortSignal that fires on timeout or when the outer
 * signal aborts. The returned promise settles as soon as either happens, even
 * if the task ignores its signal.
 */
export async function withDeadline<T>(task: (signal: AbortSignal) => Promise<T>, options: DeadlineOptions): Promise<T> {
  if (options.signal.aborted) {
    throw options.onAbort();
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let forwardAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(options.onTimeout());
    }, options.timeoutMs);
    forwardAbort = () => {
      controller.abort();
      reject(options.onAbort());
    };
    options.signal.addEventListener('abort', forwardAbort, { once: true });
  });

  const running = task(controller.signal);
  running.catch((error: unknown) => {
    if (controller.signal.aborted) {
      logger.debug('Abandoned call settled with an error', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  try {
    return await Promise.race([running, deadline]);
  } finally {
    clearTimeout(timer);
    if (forwardAbort) {
      options.signal.removeEventListener('abort', forwardAbort);
    }
  }
}
