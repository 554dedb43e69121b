export type ProviderErrorContext = {
  provider: string;
  status?: number;
  requestUrl?: string;
};

abstract class ProviderError extends Error {
  readonly provider: string;
  readonly status?: number;
  readonly requestUrl?: string;
  readonly cause?: unknown;

  protected constructor(name: string, message: string, context: ProviderErrorContext, cause?: unknown) {
    super(message);
    this.name = name;
    this.provider = context.provider;
    this.status = context.status;
    this.requestUrl = context.requestUrl;
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Timeout, refused connection or a 5xx-equivalent answer. Worth another attempt. */
export class RetryableTransportError extends ProviderError {
  readonly isTimeout: boolean;

  constructor(message: string, context: ProviderErrorContext & { isTimeout?: boolean }, cause?: unknown) {
    super("RetryableTransportError", message, context, cause);
    this.isTimeout = context.isTimeout ?? false;
  }
}

/** 4xx-equivalent or unparseable payload. Retrying cannot help. */
export class TerminalClientError extends ProviderError {
  constructor(message: string, context: ProviderErrorContext, cause?: unknown) {
    super("TerminalClientError", message, context, cause);
  }

  get isCredentialFailure(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

export class RateLimitedError extends ProviderError {
  readonly retryAfterMs?: number;

  constructor(message: string, context: ProviderErrorContext & { retryAfterMs?: number }) {
    super("RateLimitedError", message, context);
    this.retryAfterMs = context.retryAfterMs;
  }
}

export class CircuitOpenError extends ProviderError {
  readonly retryAfterMs: number;

  constructor(provider: string, retryAfterMs: number) {
    super(
      "CircuitOpenError",
      `Circuit breaker for ${provider} is open, retry after ${Math.ceil(retryAfterMs / 1000)}s`,
      { provider }
    );
    this.retryAfterMs = retryAfterMs;
  }
}

export const isRetryableTransportError = (err: unknown): err is RetryableTransportError =>
  err instanceof RetryableTransportError;

/** Failures that mean "the provider is not answering right now" rather than "this request is wrong". */
export const isTransientProviderFailure = (err: unknown): err is RetryableTransportError | CircuitOpenError =>
  err instanceof RetryableTransportError || err instanceof CircuitOpenError;

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
