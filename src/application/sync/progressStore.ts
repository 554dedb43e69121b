import {
  allowedTransitions,
  createIdleProgress,
  isActiveStatus,
  isTerminalStatus,
  type JobProgress,
  type SyncKind
} from "../../core/jobs/JobProgress";

export type ProgressPatch = Partial<Omit<JobProgress, "kind" | "startedAt">>;

export class ProgressInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProgressInvariantError";
  }
}

/**
 * Current status of one sync kind. The running job is the only writer; any number of
 * pollers read. Every write replaces the snapshot wholesale, so a reader never observes a
 * half-applied update.
 */
export class ProgressStore {
  private snapshot: Readonly<JobProgress>;

  constructor(readonly kind: SyncKind) {
    this.snapshot = Object.freeze(createIdleProgress(kind));
  }

  get(): JobProgress {
    return { ...this.snapshot };
  }

  isActive(): boolean {
    return isActiveStatus(this.snapshot.status);
  }

  /** Resets counters for a new run and moves to `starting`. */
  start(now: Date = new Date()): JobProgress {
    this.assertTransition(this.snapshot.status, "starting");
    this.snapshot = Object.freeze({
      ...createIdleProgress(this.kind),
      status: "starting",
      startedAt: now.toISOString()
    });
    return this.get();
  }

  update(patch: ProgressPatch): JobProgress {
    const prev = this.snapshot;
    if (isTerminalStatus(prev.status)) {
      throw new ProgressInvariantError(`Progress for ${this.kind} is frozen in status ${prev.status}`);
    }

    const next: JobProgress = { ...prev, ...patch };

    if (next.status !== prev.status) {
      this.assertTransition(prev.status, next.status);
    }
    if (prev.status === "running" && next.current < prev.current) {
      throw new ProgressInvariantError(`current must not decrease (${prev.current} -> ${next.current})`);
    }
    if (next.succeeded + next.skipped + next.errored > next.current) {
      throw new ProgressInvariantError(
        `succeeded + skipped + errored (${next.succeeded + next.skipped + next.errored}) exceeds current (${next.current})`
      );
    }

    this.snapshot = Object.freeze(next);
    return this.get();
  }

  private assertTransition(from: JobProgress["status"], to: JobProgress["status"]): void {
    if (!allowedTransitions[from].includes(to)) {
      throw new ProgressInvariantError(`Illegal status transition ${from} -> ${to} for ${this.kind}`);
    }
  }
}
