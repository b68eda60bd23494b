import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** A derived signal together with a way to release what keeps it armed. */
export interface ClearableSignal {
  signal: AbortSignal;
  /** Releases the timer or source listeners; the signal then never aborts. */
  clear: VoidFunction;
}

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError}
 * after `timeoutMs`. Returns `null` when the timeout is `false` or `0`.
 */
export function createTimeoutSignal(timeoutMs?: number | false): ClearableSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  return { signal: controller.signal, clear: () => clearTimeout(timeout) };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is.
 * - Otherwise a new signal aborts as soon as any source aborts, keeping the
 *   source's `reason`, or an {@link AbortError} when it has none.
 *
 * `clear` detaches from the sources; call it once the request settles so a
 * long-lived source signal does not collect listeners.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): ClearableSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  const [first] = active;
  if (!first) {
    return null;
  }

  if (active.length === 1) {
    return { signal: first, clear: () => {} };
  }

  const controller = new AbortController();
  const listeners: VoidFunction[] = [];
  const clear = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  const abortFrom = (source: AbortSignal) => {
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  controller.signal.addEventListener('abort', clear, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, clear };
}
