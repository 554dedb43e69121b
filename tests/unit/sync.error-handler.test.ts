import {
  classifyRecordFailure,
  createSyncRunSummaryTracker,
  SyncFatalError,
  toSyncFatalError,
  wrapRepositoryFailure
} from "../../src/application/sync/sync.error-handler";
import { InvalidReleaseError } from "../../src/core/catalog/transformRelease";
import {
  CircuitOpenError,
  RateLimitedError,
  RetryableTransportError,
  TerminalClientError
} from "../../src/shared/errors/provider.errors";
import { AbortedError } from "../../src/shared/retry/retry";

const recordContext = { kind: "catalog" as const, naturalKey: "42", current: 7 };

describe("toSyncFatalError", () => {
  it("reports a cancelled run", () => {
    const fatal = toSyncFatalError(new AbortedError(), { kind: "history" });

    expect(fatal).toMatchObject({ code: "cancelled", message: "Sync cancelled", context: { kind: "history" } });
  });

  it("names the provider on a credential failure", () => {
    const fatal = toSyncFatalError(
      new TerminalClientError("Discogs request failed: 401", { provider: "Discogs", status: 401 }),
      { kind: "catalog", page: 3 }
    );

    expect(fatal.code).toBe("provider_terminal");
    expect(fatal.message).toBe("Discogs rejected the credentials (401)");
    expect(fatal.context).toEqual({ kind: "catalog", page: 3 });
  });

  it("includes the provider message for other rejections", () => {
    const fatal = toSyncFatalError(
      new TerminalClientError("Last.fm error 6: User not found", { provider: "Last.fm", status: 400 }),
      { kind: "history" }
    );

    expect(fatal.message).toBe("Last.fm rejected the request: Last.fm error 6: User not found");
  });

  it("treats exhausted retries and an open circuit as unreachable", () => {
    const transport = toSyncFatalError(
      new RetryableTransportError("Discogs request failed: 503", { provider: "Discogs", status: 503 }),
      { kind: "catalog" }
    );
    const open = toSyncFatalError(new CircuitOpenError("Discogs", 120_000), { kind: "catalog" });

    expect(transport).toMatchObject({
      code: "provider_unreachable",
      message: "Discogs is unreachable: Discogs request failed: 503"
    });
    expect(open).toMatchObject({
      code: "provider_unreachable",
      message: "Discogs is unreachable: Circuit breaker for Discogs is open, retry after 120s"
    });
  });

  it("passes an already classified error through", () => {
    const original = wrapRepositoryFailure(new Error("connection refused"), { kind: "catalog" });

    expect(toSyncFatalError(original, { kind: "history" })).toBe(original);
  });

  it("wraps anything else as unexpected", () => {
    const fatal = toSyncFatalError("boom", { kind: "catalog" });

    expect(fatal).toBeInstanceOf(SyncFatalError);
    expect(fatal).toMatchObject({ code: "unexpected", message: "Unexpected sync failure: boom", cause: "boom" });
  });
});

describe("classifyRecordFailure", () => {
  it("counts invalid data against the record only", () => {
    const decision = classifyRecordFailure(new InvalidReleaseError("Invalid release 42: missing title"), recordContext);

    expect(decision).toEqual({
      action: "error",
      code: "invalid_record",
      stopPagination: false,
      log: {
        event: "sync.record_failed",
        kind: "catalog",
        code: "invalid_record",
        reason: "Invalid release 42: missing title",
        naturalKey: "42"
      }
    });
  });

  it.each([
    { error: new TerminalClientError("Discogs request failed: 404", { provider: "Discogs", status: 404 }), code: "provider_rejected", stop: false },
    { error: new RetryableTransportError("Discogs request failed: 502", { provider: "Discogs", status: 502 }), code: "provider_unavailable", stop: false },
    { error: new RateLimitedError("Discogs request failed: 429", { provider: "Discogs", status: 429 }), code: "provider_rate_limited", stop: true },
    { error: new CircuitOpenError("Discogs", 1000), code: "provider_unavailable", stop: true }
  ])("maps $error.name to $code", ({ error, code, stop }) => {
    expect(classifyRecordFailure(error, recordContext)).toMatchObject({ action: "error", code, stopPagination: stop });
  });

  it("fails the run on rejected credentials", () => {
    const decision = classifyRecordFailure(
      new TerminalClientError("Discogs request failed: 403", { provider: "Discogs", status: 403 }),
      recordContext
    );

    if (decision.action !== "fail") throw new Error("expected the run to fail");
    expect(decision.error.code).toBe("provider_terminal");
    expect(decision.error.context).toEqual(recordContext);
  });

  it("fails the run on cancellation", () => {
    const decision = classifyRecordFailure(new AbortedError(), recordContext);

    expect(decision).toMatchObject({ action: "fail", error: { code: "cancelled" } });
  });
});

describe("wrapRepositoryFailure", () => {
  it("keeps the storage error as the cause", () => {
    const cause = new Error("connection refused");
    const fatal = wrapRepositoryFailure(cause, { kind: "history", current: 12 });

    expect(fatal).toMatchObject({
      code: "repository_write_failed",
      message: "Storage unavailable for history: connection refused",
      context: { kind: "history", current: 12 },
      cause
    });
  });
});

describe("createSyncRunSummaryTracker", () => {
  it("totals skips and errors across their breakdowns", () => {
    const tracker = createSyncRunSummaryTracker("history");
    tracker.addSeen();
    tracker.addSeen();
    tracker.addSeen();
    tracker.addPage();
    tracker.addSucceeded(1);
    tracker.addSkipped("duplicate_window");
    tracker.addSkipped("known");
    tracker.addErrored("write_rejected", 2);

    expect(tracker.summary("limit")).toEqual({
      kind: "history",
      outcome: "limit",
      current: 3,
      succeeded: 1,
      skipped: 2,
      errored: 2,
      pagesFetched: 1,
      skippedByDecision: { duplicate_window: 1, known: 1 },
      erroredByCode: { write_rejected: 2 }
    });
  });
});
