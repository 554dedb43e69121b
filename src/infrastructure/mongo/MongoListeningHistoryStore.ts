import type { AnyBulkWriteOperation, Collection } from "mongodb";
import type { WindowedEvent } from "../../core/dedup/windowCleanup";
import type { ListeningEventDoc } from "../../core/history/history.types";
import type { BatchWriteResult, ListeningHistoryStore } from "../../ports/SyncStore";
import { mongoIndexes } from "./mongo.indexes";
import { runBatchWrite } from "./mongoBatchWrite";
import type { MongoConnection } from "./MongoConnection";

export class MongoListeningHistoryStore implements ListeningHistoryStore {
  private collection?: Collection<ListeningEventDoc>;

  constructor(
    private readonly connection: Pick<MongoConnection, "db">,
    private readonly collectionName = "listening_history"
  ) {}

  private async getCollection(): Promise<Collection<ListeningEventDoc>> {
    if (this.collection) return this.collection;

    const db = await this.connection.db();
    const col = db.collection<ListeningEventDoc>(this.collectionName);

    for (const idx of mongoIndexes.listeningHistory) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async existingNaturalKeys(): Promise<Set<string>> {
    const col = await this.getCollection();
    const rows = await col.find({}).project<{ naturalKey: string }>({ _id: 0, naturalKey: 1 }).toArray();
    return new Set(rows.map((row) => row.naturalKey));
  }

  async findByNaturalKey(key: string): Promise<ListeningEventDoc | null> {
    const col = await this.getCollection();
    return col.findOne({ naturalKey: key });
  }

  async findWithinWindow(trackKey: string, timestamp: number, windowSeconds: number): Promise<ListeningEventDoc | null> {
    const col = await this.getCollection();
    return col.findOne({
      trackKey,
      timestamp: { $gt: timestamp - windowSeconds, $lt: timestamp + windowSeconds }
    });
  }

  async writeBatch(docs: ListeningEventDoc[]): Promise<BatchWriteResult> {
    if (docs.length === 0) {
      return { committed: [], failed: [] };
    }

    const col = await this.getCollection();
    const ops: AnyBulkWriteOperation<ListeningEventDoc>[] = docs.map((doc) => ({
      updateOne: {
        filter: { naturalKey: doc.naturalKey },
        update: { $setOnInsert: doc },
        upsert: true
      }
    }));

    return runBatchWrite(
      docs.map((doc) => doc.naturalKey),
      () => col.bulkWrite(ops, { ordered: false })
    );
  }

  async listWindowedEvents(): Promise<WindowedEvent[]> {
    const col = await this.getCollection();
    return col.find({}).project<WindowedEvent>({ _id: 1, trackKey: 1, timestamp: 1 }).toArray();
  }

  async deleteByIds(ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const col = await this.getCollection();
    const res = await col.deleteMany({ _id: { $in: ids } });
    return res.deletedCount ?? 0;
  }
}
