/**
 * Signal handling for graceful shutdown.
 *
 * SIGINT and SIGTERM abort a shared AbortController; the install pipeline
 * watches its signal and unwinds through its cleanup paths.
 */

export interface SignalController {
  /**
   * AbortSignal that triggers when SIGINT/SIGTERM is received.
   */
  readonly signal: AbortSignal;

  /**
   * Clean up signal handlers. Must be called when done.
   */
  readonly cleanup: () => void;

  readonly aborted: boolean;
}

export const createSignalController = (): SignalController => {
  const controller = new AbortController();
  let cleaned = false;

  const handleSignal = (): void => {
    if (!(cleaned || controller.signal.aborted)) {
      controller.abort();
    }
  };

  process.on("SIGINT", handleSignal);
  process.on("SIGTERM", handleSignal);

  const cleanup = (): void => {
    if (cleaned) return;
    cleaned = true;
    process.off("SIGINT", handleSignal);
    process.off("SIGTERM", handleSignal);
  };

  controller.signal.addEventListener("abort", cleanup, { once: true });

  return {
    signal: controller.signal,
    cleanup,
    get aborted() {
      return controller.signal.aborted;
    },
  };
};

/**
 * SIGINT exit code (128 + signal number).
 */
export const SIGINT_EXIT_CODE = 130;
