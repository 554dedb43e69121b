import type { JobProgress, SyncKind } from "../../core/jobs/JobProgress";
import { ProgressStore } from "./progressStore";
import { resolveSyncConfig, type SyncConfig, type SyncConfigInput } from "./sync.config";
import { toSyncFatalError, type SyncRunSummary } from "./sync.error-handler";

export type SyncRun = {
  progress: ProgressStore;
  config: SyncConfig;
  signal: AbortSignal;
};

export type SyncRunner = (run: SyncRun) => Promise<SyncRunSummary>;

export type TriggerResult = { status: "started" } | { status: "conflict" };

export type CancelResult = { status: "cancelling" } | { status: "not_running" };

type ActiveRun = {
  controller: AbortController;
  done: Promise<void>;
};

/**
 * Owns the progress of every sync kind and at most one active run per kind. Runs are
 * detached: `trigger` returns as soon as the run is registered, and the outcome is only
 * observable through `progress`.
 */
export class SyncService {
  private readonly stores: Record<SyncKind, ProgressStore> = {
    catalog: new ProgressStore("catalog"),
    history: new ProgressStore("history")
  };
  private readonly active = new Map<SyncKind, ActiveRun>();

  constructor(
    private readonly runners: Record<SyncKind, SyncRunner>,
    private readonly configs: Partial<Record<SyncKind, SyncConfigInput>> = {},
    private readonly now: () => Date = () => new Date()
  ) {}

  trigger(kind: SyncKind, options: { limit?: number } = {}): TriggerResult {
    const store = this.stores[kind];
    if (store.isActive() || this.active.has(kind)) {
      return { status: "conflict" };
    }

    const config = resolveSyncConfig(kind, { ...this.configs[kind], limit: options.limit });
    store.start(this.now());
    const controller = new AbortController();

    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "sync.started", kind, limit: config.limit ?? null }));

    const done = Promise.resolve()
      .then(() => this.runners[kind]({ progress: store, config, signal: controller.signal }))
      .then(
        () => undefined,
        (err: unknown) => {
          const fatal = toSyncFatalError(err, { kind });
          // A runner that failed before reporting leaves the store active; close it here.
          if (store.isActive()) {
            store.update({ status: "error", message: fatal.message, finishedAt: this.now().toISOString() });
          }
          // eslint-disable-next-line no-console
          console.error(JSON.stringify({ event: "sync.failed", kind, code: fatal.code, message: fatal.message }));
        }
      )
      .finally(() => {
        this.active.delete(kind);
      });

    this.active.set(kind, { controller, done });
    return { status: "started" };
  }

  progress(kind: SyncKind): JobProgress {
    return this.stores[kind].get();
  }

  cancel(kind: SyncKind): CancelResult {
    const run = this.active.get(kind);
    if (!run || run.controller.signal.aborted) {
      return { status: "not_running" };
    }
    run.controller.abort();
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "sync.cancel_requested", kind }));
    return { status: "cancelling" };
  }

  /** Resolves once the active run of `kind` has settled; immediately when none is active. */
  whenIdle(kind: SyncKind): Promise<void> {
    return this.active.get(kind)?.done ?? Promise.resolve();
  }
}
