export const RESIZE_DEBOUNCE_MS = 300;

export interface Debouncer<T> {
  /** Replaces any pending call; only the latest argument is delivered. */
  schedule: (arg: T) => void;
  cancel: () => void;
  /** Runs the pending call now, if there is one. */
  flush: () => void;
  readonly pending: boolean;
}

export const createDebouncer = <T>(delayMs: number, fn: (arg: T) => void): Debouncer<T> => {
  let timer: ReturnType<typeof setTimeout> | null = null;
  let latest: { arg: T } | null = null;

  const cancel = () => {
    if (timer) {
      clearTimeout(timer);
    }
    timer = null;
    latest = null;
  };

  const flush = () => {
    const call = latest;
    cancel();
    if (call) {
      fn(call.arg);
    }
  };

  return {
    schedule(arg: T) {
      if (timer) {
        clearTimeout(timer);
      }
      latest = { arg };
      timer = setTimeout(flush, delayMs);
    },
    cancel,
    flush,
    get pending() {
      return latest !== null;
    },
  };
};
