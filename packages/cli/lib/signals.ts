import { getLogger } from "@deskwatch/utils/logger";

/**
 * Aborts on the first SIGINT or SIGTERM so long-running loops can finish
 * their current step and clean up.
 */
export function shutdownSignal(logger = getLogger("cli")): AbortSignal {
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  return controller.signal;
}

export function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
