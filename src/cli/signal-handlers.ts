/*
Purpose: turn SIGINT/SIGTERM into an AbortSignal the pipeline checks between steps.
Assumptions: the first signal requests a stop; after that the default handlers apply again,
so a second Ctrl-C terminates immediately.
*/

export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
  isStopped: () => boolean;
};

export type RunStopSignalOptions = {
  onSignal?: (signal: NodeJS.Signals) => void;
  signals?: NodeJS.Signals[];
};

export function createRunStopSignalHandler(
  opts: RunStopSignalOptions = {},
): RunStopSignalHandler {
  const controller = new AbortController();
  const signals = opts.signals ?? ["SIGINT", "SIGTERM"];

  const cleanup = (): void => {
    for (const name of signals) {
      process.off(name, handle);
    }
  };

  function handle(signal: NodeJS.Signals): void {
    cleanup();
    if (controller.signal.aborted) return;
    controller.abort(signal);
    opts.onSignal?.(signal);
  }

  for (const name of signals) {
    process.on(name, handle);
  }

  return {
    signal: controller.signal,
    cleanup,
    isStopped: () => controller.signal.aborted,
  };
}
