/**
 * AbortSignal plumbing for collaborator calls.
 *
 * Timers go through setTimeout (not AbortSignal.timeout) so that tests
 * driving fake timers control every deadline.
 */

import { CancellationRequestedError } from "../errors/catalog.js";

/** Longest delay setTimeout honours; Node fires larger delays after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export interface Deadline {
  signal: AbortSignal;
  /** Clear the timer and detach from the parent signal. */
  dispose(): void;
}

/**
 * Signal that aborts after `timeoutMs` with the error built by `onTimeout`,
 * or earlier when `parent` aborts. A non-positive timeout, or one past
 * MAX_TIMER_MS, disables the timer.
 */
export function createDeadline(
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal,
): Deadline {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;

  if (timeoutMs > 0 && timeoutMs <= MAX_TIMER_MS) {
    timer = setTimeout(() => {
      timer = null;
      controller.abort(onTimeout());
    }, timeoutMs);
  }

  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };

  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    dispose() {
      if (timer !== null) {
        clearTimeout(timer);
        timer = null;
      }
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/** The abort reason as an Error; non-Error reasons become a cancellation. */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new CancellationRequestedError();
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as `signal`
 * aborts. The underlying work is not stopped; only the wait is abandoned.
 */
export function raceSignal<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortReason(signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
