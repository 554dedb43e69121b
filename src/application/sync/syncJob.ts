import {
  SessionLedger,
  type DedupDecision,
  type DedupSubject,
  type DeduplicationGuard
} from "../../core/dedup/deduplicationGuard";
import type { SyncKind } from "../../core/jobs/JobProgress";
import type { PageSource } from "../../ports/ProviderClient";
import type { BatchWriteResult, SyncStore } from "../../ports/SyncStore";
import type { Pacer } from "../../shared/concurrency/pacer";
import { AbortedError } from "../../shared/retry/retry";
import { fetchAll, type FetchOutcome, type StopReason } from "./fetchAll";
import type { ProgressStore } from "./progressStore";
import type { SyncConfig } from "./sync.config";
import {
  classifyRecordFailure,
  createSyncRunSummaryTracker,
  toSyncFatalError,
  wrapRepositoryFailure,
  type SyncRunSummary
} from "./sync.error-handler";

/**
 * Everything a run needs to know about one sync kind: where records come from, how they
 * are identified, how a new one becomes a document, and where documents go.
 */
export type SyncPipeline<TItem, TDoc> = {
  kind: SyncKind;
  source: PageSource<TItem>;
  store: SyncStore<TDoc>;
  guard: DeduplicationGuard<TDoc>;
  pace: Pacer;
  /** Whether known natural keys are loaded up front and filtered out before any per-record work. */
  useSkipSet: boolean;
  naturalKeyOf(item: TItem): string;
  dedupSubjectOf(item: TItem): DedupSubject;
  labelOf(item: TItem): string;
  toDoc(item: TItem, signal?: AbortSignal): Promise<TDoc>;
};

export type SyncJobDeps<TItem, TDoc> = {
  pipeline: SyncPipeline<TItem, TDoc>;
  progress: ProgressStore;
  config: SyncConfig;
  signal?: AbortSignal;
  now?: () => Date;
};

/**
 * One end-to-end run. Progress moves `starting -> running -> completed`; any run-ending
 * failure is recorded as `error` with a readable message and rethrown as SyncFatalError.
 * Checkpoints committed before the failure stay committed.
 */
export const runSyncJob = async <TItem, TDoc>(deps: SyncJobDeps<TItem, TDoc>): Promise<SyncRunSummary> => {
  const { pipeline, progress, config, signal } = deps;
  const now = deps.now ?? (() => new Date());
  const { kind, store } = pipeline;
  const tracker = createSyncRunSummaryTracker(kind);
  let total = 0;
  let currentItemLabel = "";

  const publish = (patch: { status?: "running" } = {}) => {
    const counters = tracker.counters();
    total = Math.max(total, counters.current);
    progress.update({ ...patch, ...counters, total, currentItemLabel });
  };

  const ensureNotCancelled = () => {
    if (signal?.aborted) throw new AbortedError();
  };

  try {
    let skipSet: ReadonlySet<string> = new Set<string>();
    if (pipeline.useSkipSet) {
      try {
        skipSet = await store.existingNaturalKeys();
      } catch (err) {
        throw wrapRepositoryFailure(err, { kind });
      }
    }
    ensureNotCancelled();
    publish({ status: "running" });

    const staged: TDoc[] = [];
    const session = new SessionLedger();

    const commit = async () => {
      if (staged.length === 0) return;
      const batch = staged.splice(0, staged.length);

      let result: BatchWriteResult;
      try {
        result = await store.writeBatch(batch);
      } catch (err) {
        throw wrapRepositoryFailure(err, { kind, current: tracker.counters().current });
      }

      tracker.addSucceeded(result.committed.length);
      for (const failure of result.failed) {
        tracker.addErrored("write_rejected");
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "sync.record_failed",
          kind,
          code: "write_rejected",
          reason: failure.reason,
          naturalKey: failure.naturalKey
        }));
      }
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({
        event: "sync.checkpoint_committed",
        kind,
        committed: result.committed.length,
        failed: result.failed.length,
        current: tracker.counters().current
      }));
      publish();
    };

    const pages = fetchAll<TItem>({
      kind,
      source: pipeline.source,
      pageSize: config.pageSize,
      skipSet,
      naturalKeyOf: (item) => pipeline.naturalKeyOf(item),
      pace: pipeline.pace,
      maxPages: config.maxPages,
      limit: config.limit,
      signal,
      onPage: ({ totalCount }) => {
        tracker.addPage();
        if (totalCount != null) total = Math.max(total, totalCount);
        publish();
      },
      onKnown: (item) => {
        tracker.addSeen();
        tracker.addSkipped("known");
        currentItemLabel = pipeline.labelOf(item);
        publish();
      }
    });

    let outcome: FetchOutcome;
    let yielded = 0;
    while (true) {
      const step = await pages.next();
      if (step.done) {
        outcome = step.value;
        break;
      }

      const item = step.value;
      yielded += 1;
      const naturalKey = pipeline.naturalKeyOf(item);
      tracker.addSeen();
      currentItemLabel = pipeline.labelOf(item);

      const subject = pipeline.dedupSubjectOf(item);
      let decision: DedupDecision;
      try {
        decision = await pipeline.guard.decide(subject, session);
      } catch (err) {
        throw wrapRepositoryFailure(err, { kind, naturalKey, current: tracker.counters().current });
      }

      if (decision !== "new") {
        tracker.addSkipped(decision);
        publish();
        continue;
      }

      let doc: TDoc;
      try {
        doc = await pipeline.toDoc(item, signal);
      } catch (err) {
        const failure = classifyRecordFailure(err, { kind, naturalKey, current: tracker.counters().current });
        if (failure.action === "fail") throw failure.error;

        tracker.addErrored(failure.code);
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify(failure.log));
        publish();

        if (failure.stopPagination) {
          const counters = tracker.counters();
          const reason: StopReason = failure.code === "provider_rate_limited" ? "rate_limited" : "transport_failure";
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({ event: "sync.pagination_stopped", kind, reason, pagesFetched: counters.pagesFetched }));
          const stopped: FetchOutcome = { reason, pagesFetched: counters.pagesFetched, yielded };
          await pages.return(stopped);
          outcome = stopped;
          break;
        }
        continue;
      }

      session.record(subject);
      staged.push(doc);
      publish();

      if (staged.length >= config.checkpointSize) {
        await commit();
      }
      ensureNotCancelled();
    }

    ensureNotCancelled();
    await commit();

    const summary = tracker.summary(outcome.reason);
    progress.update({
      status: "completed",
      current: summary.current,
      total: Math.max(total, summary.current),
      succeeded: summary.succeeded,
      skipped: summary.skipped,
      errored: summary.errored,
      pagesFetched: summary.pagesFetched,
      currentItemLabel: "",
      message: null,
      finishedAt: now().toISOString()
    });
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "sync.completed", ...summary }));
    return summary;
  } catch (err) {
    const fatal = toSyncFatalError(err, { kind, current: tracker.counters().current });
    progress.update({
      ...tracker.counters(),
      total: Math.max(total, tracker.counters().current),
      status: "error",
      message: fatal.message,
      finishedAt: now().toISOString()
    });
    throw fatal;
  }
};
