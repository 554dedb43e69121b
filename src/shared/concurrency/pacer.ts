import { sleep } from "../retry/retry";

/**
 * Enforces a minimum interval between consecutive outbound calls (no external deps).
 * Usage:
 *   const pace = createPacer(1000);
 *   await pace();
 *   await client.fetchPage(...);
 */
export const createPacer = (minIntervalMs: number, now: () => number = Date.now) => {
  if (!Number.isInteger(minIntervalMs) || minIntervalMs < 0) {
    throw new Error("minIntervalMs must be an integer >= 0");
  }

  let lastCallAt: number | null = null;

  return async (signal?: AbortSignal): Promise<number> => {
    let waitedMs = 0;
    if (lastCallAt != null) {
      const elapsed = now() - lastCallAt;
      if (elapsed < minIntervalMs) {
        waitedMs = minIntervalMs - elapsed;
        await sleep(waitedMs, signal);
      }
    }
    lastCallAt = now();
    return waitedMs;
  };
};

export type Pacer = ReturnType<typeof createPacer>;
