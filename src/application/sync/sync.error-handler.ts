import { InvalidReleaseError } from "../../core/catalog/transformRelease";
import type { DuplicateDecision } from "../../core/dedup/deduplicationGuard";
import { InvalidScrobbleError } from "../../core/history/transformScrobble";
import type { SyncKind } from "../../core/jobs/JobProgress";
import {
  CircuitOpenError,
  RateLimitedError,
  RetryableTransportError,
  TerminalClientError,
  toErrorMessage
} from "../../shared/errors/provider.errors";
import { AbortedError } from "../../shared/retry/retry";
import type { StopReason } from "./fetchAll";

export type RecordErrorCode =
  | "invalid_record"
  | "provider_rejected"
  | "provider_unavailable"
  | "provider_rate_limited"
  | "write_rejected";

export type SyncFailureCode =
  | "provider_terminal"
  | "provider_unreachable"
  | "repository_write_failed"
  | "cancelled"
  | "unexpected";

export type SyncErrorContext = {
  kind: SyncKind;
  page?: number;
  naturalKey?: string;
  current?: number;
};

const causeOf = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

export class SyncFatalError extends Error {
  readonly code: SyncFailureCode;
  readonly context: SyncErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: SyncFailureCode; message: string; context: SyncErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "SyncFatalError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const CANCELLED_MESSAGE = "Sync cancelled";

type SyncRecordFailedLog = {
  event: "sync.record_failed";
  kind: SyncKind;
  code: RecordErrorCode;
  reason: string;
  naturalKey: string;
};

export type RecordFailureDecision =
  | {
      action: "error";
      code: RecordErrorCode;
      stopPagination: boolean;
      log: SyncRecordFailedLog;
    }
  | {
      action: "fail";
      error: SyncFatalError;
    };

/**
 * Maps any failure onto the error that ends a run. Already-classified fatal errors pass through.
 */
export const toSyncFatalError = (reason: unknown, context: SyncErrorContext): SyncFatalError => {
  if (reason instanceof SyncFatalError) return reason;

  if (reason instanceof AbortedError) {
    return new SyncFatalError({ code: "cancelled", message: CANCELLED_MESSAGE, context });
  }

  if (reason instanceof TerminalClientError) {
    const message = reason.isCredentialFailure
      ? `${reason.provider} rejected the credentials (${String(reason.status)})`
      : `${reason.provider} rejected the request: ${reason.message}`;
    return new SyncFatalError({ code: "provider_terminal", message, context, cause: reason });
  }

  if (reason instanceof RetryableTransportError || reason instanceof CircuitOpenError) {
    return new SyncFatalError({
      code: "provider_unreachable",
      message: `${reason.provider} is unreachable: ${reason.message}`,
      context,
      cause: reason
    });
  }

  return new SyncFatalError({
    code: "unexpected",
    message: `Unexpected sync failure: ${toErrorMessage(reason)}`,
    context,
    cause: causeOf(reason)
  });
};

/**
 * Decides what a failure while turning one new record into a document means for the run.
 * Bad data and provider refusals cost that record only; credential failures and
 * cancellation end the run. A rate limit or an open circuit also stops paging early.
 */
export const classifyRecordFailure = (
  reason: unknown,
  context: Required<Pick<SyncErrorContext, "kind" | "naturalKey">> & Pick<SyncErrorContext, "current">
): RecordFailureDecision => {
  const recordError = (code: RecordErrorCode, stopPagination = false): RecordFailureDecision => ({
    action: "error",
    code,
    stopPagination,
    log: {
      event: "sync.record_failed",
      kind: context.kind,
      code,
      reason: toErrorMessage(reason),
      naturalKey: context.naturalKey
    }
  });

  if (reason instanceof InvalidReleaseError || reason instanceof InvalidScrobbleError) {
    return recordError("invalid_record");
  }
  if (reason instanceof TerminalClientError && !reason.isCredentialFailure) {
    return recordError("provider_rejected");
  }
  if (reason instanceof RateLimitedError) {
    return recordError("provider_rate_limited", true);
  }
  if (reason instanceof CircuitOpenError) {
    return recordError("provider_unavailable", true);
  }
  if (reason instanceof RetryableTransportError) {
    return recordError("provider_unavailable");
  }

  return { action: "fail", error: toSyncFatalError(reason, context) };
};

export const wrapRepositoryFailure = (reason: unknown, context: SyncErrorContext): SyncFatalError =>
  new SyncFatalError({
    code: "repository_write_failed",
    message: `Storage unavailable for ${context.kind}: ${toErrorMessage(reason)}`,
    context,
    cause: causeOf(reason)
  });

export type SyncRunSummary = {
  kind: SyncKind;
  outcome: StopReason;
  current: number;
  succeeded: number;
  skipped: number;
  errored: number;
  pagesFetched: number;
  skippedByDecision: Partial<Record<DuplicateDecision | "known", number>>;
  erroredByCode: Partial<Record<RecordErrorCode, number>>;
};

export const createSyncRunSummaryTracker = (kind: SyncKind) => {
  let current = 0;
  let succeeded = 0;
  let pagesFetched = 0;
  const skippedByDecision: SyncRunSummary["skippedByDecision"] = {};
  const erroredByCode: SyncRunSummary["erroredByCode"] = {};

  const sum = (counts: Partial<Record<string, number>>) =>
    Object.values(counts).reduce<number>((total, n) => total + (n ?? 0), 0);

  return {
    addSeen: () => {
      current += 1;
    },
    addSucceeded: (count: number) => {
      succeeded += count;
    },
    addPage: () => {
      pagesFetched += 1;
    },
    addSkipped: (decision: DuplicateDecision | "known") => {
      skippedByDecision[decision] = (skippedByDecision[decision] ?? 0) + 1;
    },
    addErrored: (code: RecordErrorCode, count = 1) => {
      erroredByCode[code] = (erroredByCode[code] ?? 0) + count;
    },
    counters: () => ({
      current,
      succeeded,
      skipped: sum(skippedByDecision),
      errored: sum(erroredByCode),
      pagesFetched
    }),
    summary: (outcome: StopReason): SyncRunSummary => ({
      kind,
      outcome,
      current,
      succeeded,
      skipped: sum(skippedByDecision),
      errored: sum(erroredByCode),
      pagesFetched,
      skippedByDecision: { ...skippedByDecision },
      erroredByCode: { ...erroredByCode }
    })
  };
};

export type SyncRunSummaryTracker = ReturnType<typeof createSyncRunSummaryTracker>;
