import {
  RateLimitedError,
  RetryableTransportError,
  TerminalClientError,
  toErrorMessage
} from "../../shared/errors/provider.errors";
import type { CircuitBreaker } from "../../shared/retry/circuitBreaker";
import { AbortedError, createRetryPolicy, type RetryPolicy, type RetryPolicyConfig } from "../../shared/retry/retry";

export type ProviderRequest = {
  provider: string;
  url: URL;
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
  redactParams?: string[];
};

/** Request URL safe for logs: origin, path and query minus credential parameters. */
export const toSafeRequestUrl = (url: URL, redactParams: string[] = []): string => {
  const safe = new URL(url.toString());
  for (const name of redactParams) safe.searchParams.delete(name);
  return `${safe.origin}${safe.pathname}${safe.search}`;
};

export const parseRetryAfterMs = (header: string | null): number | undefined => {
  if (header && /^\d+$/.test(header)) return Number(header) * 1000;
  return undefined;
};

export const errorForStatus = (
  provider: string,
  status: number,
  requestUrl: string,
  retryAfterHeader: string | null = null
): Error => {
  const message = `${provider} request failed: ${status}`;
  if (status === 429) {
    return new RateLimitedError(message, { provider, status, requestUrl, retryAfterMs: parseRetryAfterMs(retryAfterHeader) });
  }
  if (status >= 500) {
    return new RetryableTransportError(message, { provider, status, requestUrl });
  }
  return new TerminalClientError(message, { provider, status, requestUrl });
};

/**
 * One GET with a per-call timeout. Response bodies of failed calls are drained and
 * dropped, never surfaced.
 */
export const requestJson = async (req: ProviderRequest): Promise<unknown> => {
  const { provider, timeoutMs } = req;
  const safeRequestUrl = toSafeRequestUrl(req.url, req.redactParams);

  if (req.signal?.aborted) throw new AbortedError();

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = () => controller.abort();
  req.signal?.addEventListener("abort", onAbort, { once: true });

  let res: Response;
  try {
    res = await fetch(req.url.toString(), {
      headers: req.headers,
      signal: controller.signal
    });
  } catch (err) {
    if (req.signal?.aborted) throw new AbortedError();
    if (controller.signal.aborted) {
      throw new RetryableTransportError(`${provider} request timeout after ${timeoutMs}ms`, {
        provider,
        requestUrl: safeRequestUrl,
        isTimeout: true
      });
    }
    throw new RetryableTransportError(`${provider} request failed: ${toErrorMessage(err)}`, {
      provider,
      requestUrl: safeRequestUrl
    }, err);
  } finally {
    clearTimeout(timeout);
    req.signal?.removeEventListener("abort", onAbort);
  }

  if (!res.ok) {
    await res.text().catch(() => "");
    throw errorForStatus(provider, res.status, safeRequestUrl, res.headers.get("retry-after"));
  }

  try {
    return await res.json();
  } catch (err) {
    throw new TerminalClientError(`${provider} response is not valid JSON`, {
      provider,
      status: res.status,
      requestUrl: safeRequestUrl
    }, err);
  }
};

const describeFailure = (error: unknown): { status: number | null; url: string | null } => {
  if (error instanceof RetryableTransportError || error instanceof TerminalClientError || error instanceof RateLimitedError) {
    return { status: error.status ?? null, url: error.requestUrl ?? null };
  }
  return { status: null, url: null };
};

/**
 * Retry policy shared by every call to one provider: only transport failures are retried,
 * and the provider's breaker is consulted before each attempt.
 */
export const createProviderRetryPolicy = (
  provider: string,
  config: RetryPolicyConfig,
  breaker: CircuitBreaker
): RetryPolicy =>
  createRetryPolicy(config, {
    breaker,
    shouldRetry: (err) => err instanceof RetryableTransportError,
    onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "http.retry",
        provider,
        ...describeFailure(error),
        attempt,
        maxAttempts,
        delayMs
      }));
    },
    onGiveUp: ({ attempt, maxAttempts, error }) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({
        event: "http.give_up",
        provider,
        ...describeFailure(error),
        attempt,
        maxAttempts
      }));
    }
  });
