import { CircuitOpenError } from "../errors/provider.errors";
import type { CircuitBreaker } from "./circuitBreaker";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryOptions = {
  maxAttempts: number;          // total attempts, including the first one
  initialDelayMs: number;       // delay after the first failed attempt
  maxDelayMs: number;           // cap for any single delay
  backoffMultiplier?: number;
  shouldRetry: (err: unknown) => RetryDecision;
  breaker?: CircuitBreaker;
  signal?: AbortSignal;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
};

export type RetryPolicyConfig = Omit<RetryOptions, "shouldRetry" | "breaker" | "signal" | "onRetry" | "onGiveUp">;

export const defaultRetryPolicyConfig: RetryPolicyConfig = {
  maxAttempts: 3,
  initialDelayMs: 2000,
  maxDelayMs: 10000,
  backoffMultiplier: 2
};

export class AbortedError extends Error {
  constructor(message = "Operation aborted") {
    super(message);
    this.name = "AbortedError";
  }
}

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/** Backoff for the delay that follows failed attempt number `attempt` (1-based). */
export const computeBackoffDelay = (
  attempt: number,
  opts: Pick<RetryOptions, "initialDelayMs" | "maxDelayMs" | "backoffMultiplier">
): number => {
  const multiplier = opts.backoffMultiplier ?? 2;
  return Math.min(opts.maxDelayMs, opts.initialDelayMs * Math.pow(multiplier, attempt - 1));
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    maxAttempts,
    maxDelayMs,
    shouldRetry,
    breaker,
    signal,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0
  } = opts;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error("maxAttempts must be an integer >= 1");
  }

  let attempt = 0;
  while (true) {
    if (signal?.aborted) throw new AbortedError();

    // A refused call fails fast and does not use up an attempt.
    if (breaker && !breaker.allow()) {
      throw new CircuitOpenError(breaker.name, breaker.remainingCooldownMs());
    }

    attempt += 1;
    try {
      const result = await fn();
      breaker?.recordSuccess();
      return result;
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;

      if (normalized.retry) {
        breaker?.recordFailure();
      }

      if (attempt >= maxAttempts || !normalized.retry) {
        onGiveUp?.({ attempt, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const backoff = customDelayMs != null
        ? Math.min(maxDelayMs, customDelayMs)
        : computeBackoffDelay(attempt, opts);
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
      const waitMs = Math.min(maxDelayMs, backoff + jitter);
      onRetry?.({ attempt, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs, signal);
    }
  }
};

/**
 * Binds retry settings and a breaker once so every call to a dependency shares them.
 */
export const createRetryPolicy = (
  config: RetryPolicyConfig,
  bindings: Pick<RetryOptions, "shouldRetry" | "breaker" | "onRetry" | "onGiveUp">
) => ({
  execute: <T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> =>
    retry(operation, { ...config, ...bindings, signal })
});

export type RetryPolicy = ReturnType<typeof createRetryPolicy>;
