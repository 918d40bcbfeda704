/*
Purpose: turn SIGINT/SIGTERM into an AbortSignal for the running build.
Assumptions: one build per process; a second signal falls through to Node's default.
Usage: const stop = createStopSignalHandler({ onSignal }); ... stop.cleanup();
*/

export type StopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
};

const STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function createStopSignalHandler(options: {
  onSignal?: (signal: NodeJS.Signals) => void;
} = {}): StopSignalHandler {
  const controller = new AbortController();

  const handler = (signal: NodeJS.Signals): void => {
    options.onSignal?.(signal);
    controller.abort({ signal });
  };

  for (const signal of STOP_SIGNALS) {
    process.once(signal, handler);
  }

  return {
    signal: controller.signal,
    cleanup() {
      for (const signal of STOP_SIGNALS) {
        process.off(signal, handler);
      }
    },
  };
}
