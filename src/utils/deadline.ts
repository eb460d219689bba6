import { TimeoutError } from "../errors";

export interface Deadline {
  readonly signal: AbortSignal;
  /** Stop the timer without touching the signal. */
  clear(): void;
  /** Stop the timer and abort anything still running under the signal. */
  release(): void;
}

/**
 * Request-scoped deadline. When it elapses the signal aborts with a
 * TimeoutError as its reason. An outer signal, when given, aborts it too.
 */
export function createDeadline(ms: number, outer?: AbortSignal): Deadline {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new TimeoutError(`Request deadline of ${ms}ms exceeded`));
  }, ms);
  const onOuterAbort = () => controller.abort(outer?.reason);
  if (outer?.aborted) onOuterAbort();
  else outer?.addEventListener("abort", onOuterAbort, { once: true });

  const clear = () => {
    clearTimeout(timer);
    outer?.removeEventListener("abort", onOuterAbort);
  };

  return {
    signal: controller.signal,
    clear,
    release: () => {
      clear();
      if (!controller.signal.aborted) controller.abort(new Error("request finished"));
    },
  };
}
