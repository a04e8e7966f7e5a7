import type { ProcessExit, ProcessHandle } from './ProcessLauncher.js';

export interface SupervisedExit extends ProcessExit {
  timedOut: boolean;
  interrupted: boolean;
}

/**
 * Waits for a launched process, terminating it on timeout or abort:
 * SIGTERM first, SIGKILL once `killGraceMs` has passed.
 */
export async function superviseProcess(
  handle: ProcessHandle,
  options: { timeoutMs: number; killGraceMs: number; signal?: AbortSignal; onTimeout?: () => void }
): Promise<SupervisedExit> {
  let timedOut = false;
  let interrupted = false;
  let killTimer: NodeJS.Timeout | undefined;

  const terminate = (): void => {
    if (killTimer) {
      return;
    }
    handle.kill('SIGTERM');
    killTimer = setTimeout(() => handle.kill('SIGKILL'), options.killGraceMs);
  };
  const timeoutTimer = setTimeout(() => {
    timedOut = true;
    options.onTimeout?.();
    terminate();
  }, options.timeoutMs);
  const onAbort = (): void => {
    interrupted = true;
    terminate();
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    const exit = await handle.exited;
    return { ...exit, timedOut, interrupted };
  } finally {
    clearTimeout(timeoutTimer);
    clearTimeout(killTimer);
    options.signal?.removeEventListener('abort', onAbort);
  }
}
