import { TimeoutExceededError } from "./errors";

/**
 * A probe telling whether a dependency accepts requests. Transient failures
 * (connection refused, resets) are the probe's to absorb: it should report
 * them as `false`. Anything it throws is passed through to the caller.
 * The poller's abort signal is handed over so a probe can give up early.
 */
export type ReadinessCheck = (signal?: AbortSignal) => boolean | Promise<boolean>;

export interface WaitUntilReadyParameters {
  timeout: number;
  pause: number;
  signal?: AbortSignal;
  /** Used in the timeout error, e.g. the compose service name. */
  description?: string;
  now?: () => number;
}

/**
 * Invokes `check` until it reports `true`, pausing a fixed `pause` between
 * attempts. Elapsed time is compared with `timeout` after every pause; once it
 * is reached the returned promise rejects with {@link TimeoutExceededError}.
 *
 * The first attempt always happens, so a dependency that is already up is
 * reported ready even with a zero timeout.
 */
export async function waitUntilReady(
  check: ReadinessCheck,
  { timeout, pause, signal, description = "service", now = () => Date.now() }: WaitUntilReadyParameters
): Promise<void> {
  if (!Number.isFinite(pause) || pause < 0) {
    throw new RangeError(`pause must be a non-negative number of milliseconds, got ${pause}`);
  }

  const startTime = now();
  let attempts = 0;

  do {
    signal?.throwIfAborted();

    attempts += 1;
    const ready = await check(signal);
    signal?.throwIfAborted();
    if (ready) {
      return;
    }

    await sleep(pause, signal);
  } while (now() - startTime < timeout);

  throw new TimeoutExceededError(description, timeout, attempts);
}

function sleep(duration: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, duration);
      return;
    }

    signal.throwIfAborted();

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, duration);

    signal.addEventListener("abort", onAbort, { once: true });
  });
}
