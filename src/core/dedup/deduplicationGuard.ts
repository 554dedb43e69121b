import { DEDUP_WINDOW_SECONDS } from "../history/history.types";

export type DedupDecision = "new" | "duplicate_exact" | "duplicate_window" | "duplicate_session";

export type DuplicateDecision = Exclude<DedupDecision, "new">;

/**
 * What the guard needs to know about an incoming record. `window` is only set for kinds
 * whose events can be double-reported under slightly different timestamps.
 */
export type DedupSubject = {
  naturalKey: string;
  window?: {
    trackKey: string;
    timestamp: number;
  };
};

export type DedupLookup<TDoc> = {
  findByNaturalKey(key: string): Promise<TDoc | null>;
  findWithinWindow?(trackKey: string, timestamp: number, windowSeconds: number): Promise<TDoc | null>;
};

/**
 * Records accepted earlier in the current run. They may still sit in an uncommitted
 * checkpoint, so storage lookups cannot see them yet.
 */
export class SessionLedger {
  private readonly keys = new Set<string>();
  private readonly timestampsByTrack = new Map<string, number[]>();

  has(naturalKey: string): boolean {
    return this.keys.has(naturalKey);
  }

  hasWithinWindow(trackKey: string, timestamp: number, windowSeconds: number): boolean {
    const timestamps = this.timestampsByTrack.get(trackKey);
    if (!timestamps) return false;
    return timestamps.some((seen) => Math.abs(seen - timestamp) < windowSeconds);
  }

  record(subject: DedupSubject): void {
    this.keys.add(subject.naturalKey);
    if (!subject.window) return;

    const timestamps = this.timestampsByTrack.get(subject.window.trackKey) ?? [];
    timestamps.push(subject.window.timestamp);
    this.timestampsByTrack.set(subject.window.trackKey, timestamps);
  }

  get size(): number {
    return this.keys.size;
  }
}

/**
 * Checks, in order:
 * 1. exact natural key already persisted (reruns of the same import)
 * 2. windowed kinds: a persisted event for the same track within the window (provider double-reports)
 * 3. natural key accepted earlier in this run (duplicates inside one page or checkpoint)
 * 4. windowed kinds: an event for the same track accepted earlier in this run within the window
 *
 * The window is symmetric: an event is a duplicate whether the earlier play is before or after it.
 */
export class DeduplicationGuard<TDoc> {
  constructor(
    private readonly lookup: DedupLookup<TDoc>,
    private readonly windowSeconds: number = DEDUP_WINDOW_SECONDS
  ) {}

  async decide(subject: DedupSubject, session: SessionLedger): Promise<DedupDecision> {
    if ((await this.lookup.findByNaturalKey(subject.naturalKey)) != null) {
      return "duplicate_exact";
    }

    const window = subject.window;
    if (window && this.lookup.findWithinWindow) {
      const nearby = await this.lookup.findWithinWindow(window.trackKey, window.timestamp, this.windowSeconds);
      if (nearby != null) return "duplicate_window";
    }

    if (session.has(subject.naturalKey)) {
      return "duplicate_session";
    }

    if (window && session.hasWithinWindow(window.trackKey, window.timestamp, this.windowSeconds)) {
      return "duplicate_window";
    }

    return "new";
  }
}
