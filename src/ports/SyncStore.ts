import type { AlbumDoc } from "../core/catalog/catalog.types";
import type { DedupLookup } from "../core/dedup/deduplicationGuard";
import type { WindowedEvent } from "../core/dedup/windowCleanup";
import type { ListeningEventDoc } from "../core/history/history.types";

export type BatchWriteFailure = {
  naturalKey: string;
  reason: string;
};

/** Per-record outcome of one checkpoint: committed records stay even when others fail. */
export type BatchWriteResult = {
  committed: string[];
  failed: BatchWriteFailure[];
};

/**
 * Persistence contract of one sync kind. `writeBatch` throws only when the whole
 * checkpoint could not be attempted (storage unavailable).
 */
export interface SyncStore<TDoc> extends DedupLookup<TDoc> {
  existingNaturalKeys(): Promise<Set<string>>;
  writeBatch(docs: TDoc[]): Promise<BatchWriteResult>;
}

export type AlbumStore = SyncStore<AlbumDoc>;

export interface ListeningHistoryStore extends SyncStore<ListeningEventDoc> {
  findWithinWindow(trackKey: string, timestamp: number, windowSeconds: number): Promise<ListeningEventDoc | null>;
  listWindowedEvents(): Promise<WindowedEvent[]>;
  deleteByIds(ids: string[]): Promise<number>;
}
