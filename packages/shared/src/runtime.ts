import { logger } from "./logger";

/**
 * Registers shutdown handlers for SIGINT/SIGTERM.
 * Used by both the API and the worker process. A failing cleanup still exits,
 * with a non-zero code.
 */
export function onShutdown(fn: (signal: NodeJS.Signals) => Promise<void> | void) {
  const handler = async (signal: NodeJS.Signals) => {
    let exitCode = 0;
    try {
      await fn(signal);
    } catch (error) {
      exitCode = 1;
      logger.error({ service: "runtime", signal, error }, "shutdown failed");
    } finally {
      process.exit(exitCode);
    }
  };

  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
