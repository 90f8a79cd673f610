/**
 * Controller that aborts when any of the given signals aborts. Call
 * `dispose()` once done so the parent signals drop their listeners.
 */
export function linkSignals(...signals: (AbortSignal | undefined)[]): {
  signal: AbortSignal;
  abort: () => void;
  dispose: () => void;
} {
  const controller = new AbortController();
  const abort = (): void => controller.abort();
  const linked = signals.filter((s): s is AbortSignal => s !== undefined);

  for (const signal of linked) {
    if (signal.aborted) {
      controller.abort();
      break;
    }
    signal.addEventListener('abort', abort, { once: true });
  }

  return {
    signal: controller.signal,
    abort,
    dispose: () => {
      for (const signal of linked) {
        signal.removeEventListener('abort', abort);
      }
    },
  };
}
