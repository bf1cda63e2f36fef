export const MERGE_STOP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

// Anything that delivers process signals; `process` in production.
export interface SignalSource {
  once(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export type MergeStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  stoppedBy: () => NodeJS.Signals | null;
};

// The first stop signal aborts the running merge. All listeners detach after that delivery or on cleanup().
export function createMergeStopSignalHandler(
  opts: {
    onSignal?: (signal: NodeJS.Signals) => void;
    signals?: readonly NodeJS.Signals[];
    source?: SignalSource;
  } = {},
): MergeStopSignalHandler {
  const source = opts.source ?? process;
  const controller = new AbortController();
  const listeners = new Map<NodeJS.Signals, () => void>();
  let received: NodeJS.Signals | null = null;

  const cleanup = (): void => {
    for (const [signal, listener] of listeners) {
      source.off(signal, listener);
    }
    listeners.clear();
  };

  for (const signal of opts.signals ?? MERGE_STOP_SIGNALS) {
    const listener = (): void => {
      received = signal;
      cleanup();
      controller.abort(signal);
      opts.onSignal?.(signal);
    };
    listeners.set(signal, listener);
    source.once(signal, listener);
  }

  return {
    signal: controller.signal,
    cleanup,
    stoppedBy: () => received,
  };
}
