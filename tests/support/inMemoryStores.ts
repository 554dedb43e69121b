import type { AlbumDoc } from "../../src/core/catalog/catalog.types";
import type { WindowedEvent } from "../../src/core/dedup/windowCleanup";
import type { ListeningEventDoc } from "../../src/core/history/history.types";
import type { AlbumStore, BatchWriteResult, ListeningHistoryStore, SyncStore } from "../../src/ports/SyncStore";

/**
 * Map-backed store. `rejectKeys` makes individual records fail inside a batch;
 * `failBatchNumber` makes that (1-based) writeBatch call throw as if storage were down.
 */
export class InMemorySyncStore<TDoc> implements SyncStore<TDoc> {
  readonly docs = new Map<string, TDoc>();
  readonly rejectKeys = new Set<string>();
  failBatchNumber?: number;
  failLookups = false;
  batchSizes: number[] = [];

  constructor(protected readonly keyOf: (doc: TDoc) => string) {}

  seed(docs: TDoc[]): void {
    for (const doc of docs) this.docs.set(this.keyOf(doc), doc);
  }

  async existingNaturalKeys(): Promise<Set<string>> {
    if (this.failLookups) throw new Error("connection refused");
    return new Set(this.docs.keys());
  }

  async findByNaturalKey(key: string): Promise<TDoc | null> {
    if (this.failLookups) throw new Error("connection refused");
    return this.docs.get(key) ?? null;
  }

  async writeBatch(docs: TDoc[]): Promise<BatchWriteResult> {
    this.batchSizes.push(docs.length);
    if (this.failBatchNumber === this.batchSizes.length) {
      throw new Error("storage unavailable");
    }

    const result: BatchWriteResult = { committed: [], failed: [] };
    for (const doc of docs) {
      const key = this.keyOf(doc);
      if (this.rejectKeys.has(key)) {
        result.failed.push({ naturalKey: key, reason: "document failed validation" });
        continue;
      }
      if (!this.docs.has(key)) this.docs.set(key, doc);
      result.committed.push(key);
    }
    return result;
  }
}

export class InMemoryAlbumStore extends InMemorySyncStore<AlbumDoc> implements AlbumStore {
  constructor() {
    super((doc) => doc.discogsId);
  }
}

export class InMemoryListeningHistoryStore extends InMemorySyncStore<ListeningEventDoc> implements ListeningHistoryStore {
  constructor() {
    super((doc) => doc.naturalKey);
  }

  async findWithinWindow(trackKey: string, timestamp: number, windowSeconds: number): Promise<ListeningEventDoc | null> {
    for (const doc of this.docs.values()) {
      if (doc.trackKey === trackKey && Math.abs(doc.timestamp - timestamp) < windowSeconds) return doc;
    }
    return null;
  }

  async listWindowedEvents(): Promise<WindowedEvent[]> {
    return Array.from(this.docs.values(), (doc) => ({ _id: doc._id, trackKey: doc.trackKey, timestamp: doc.timestamp }));
  }

  async deleteByIds(ids: string[]): Promise<number> {
    const wanted = new Set(ids);
    let removed = 0;
    for (const [key, doc] of this.docs) {
      if (wanted.has(doc._id)) {
        this.docs.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
