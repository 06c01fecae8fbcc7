/**
 * Plainsh Core — Bounded Waits
 *
 * Runs one suspending call under a time budget and a parent cancellation
 * signal. The call receives its own AbortSignal, which fires on timeout and
 * on parent cancellation, so the callee can stop its work.
 *
 * The result is a tagged value rather than a rejection: every way a wait can
 * end is a branch the pipeline must handle explicitly.
 */

export type Bounded<T> =
  | { readonly status: 'ok'; readonly value: T }
  | { readonly status: 'timeout' }
  | { readonly status: 'aborted' }
  | { readonly status: 'error'; readonly error: unknown };

/**
 * Await `work` for at most `timeoutMs`. A non-positive or non-finite budget
 * waits without a time limit.
 */
export function bounded<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent: AbortSignal,
): Promise<Bounded<T>> {
  if (parent.aborted) {
    return Promise.resolve({ status: 'aborted' });
  }

  const controller = new AbortController();

  return new Promise<Bounded<T>>((resolve) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (result: Bounded<T>): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      parent.removeEventListener('abort', onAbort);
      resolve(result);
    };

    const onAbort = (): void => {
      controller.abort();
      finish({ status: 'aborted' });
    };

    parent.addEventListener('abort', onAbort, { once: true });
    if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timer = setTimeout(() => {
        controller.abort();
        finish({ status: 'timeout' });
      }, timeoutMs);
    }

    let pending: Promise<T>;
    try {
      pending = work(controller.signal);
    } catch (error) {
      finish({ status: 'error', error });
      return;
    }
    pending.then(
      (value) => finish({ status: 'ok', value }),
      (error: unknown) => finish({ status: 'error', error }),
    );
  });
}
