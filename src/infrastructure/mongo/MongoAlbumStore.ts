import type { AnyBulkWriteOperation, Collection } from "mongodb";
import type { AlbumDoc } from "../../core/catalog/catalog.types";
import type { AlbumStore, BatchWriteResult } from "../../ports/SyncStore";
import { mongoIndexes } from "./mongo.indexes";
import { runBatchWrite } from "./mongoBatchWrite";
import type { MongoConnection } from "./MongoConnection";

/**
 * Album documents keyed by `discogsId`. Writes are insert-only upserts, so replaying a
 * checkpoint never overwrites an album that is already stored.
 */
export class MongoAlbumStore implements AlbumStore {
  private collection?: Collection<AlbumDoc>;

  constructor(
    private readonly connection: Pick<MongoConnection, "db">,
    private readonly collectionName = "albums"
  ) {}

  private async getCollection(): Promise<Collection<AlbumDoc>> {
    if (this.collection) return this.collection;

    const db = await this.connection.db();
    const col = db.collection<AlbumDoc>(this.collectionName);

    for (const idx of mongoIndexes.albums) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collection = col;
    return col;
  }

  async existingNaturalKeys(): Promise<Set<string>> {
    const col = await this.getCollection();
    const rows = await col.find({}).project<{ discogsId: string }>({ _id: 0, discogsId: 1 }).toArray();
    return new Set(rows.map((row) => row.discogsId));
  }

  async findByNaturalKey(key: string): Promise<AlbumDoc | null> {
    const col = await this.getCollection();
    return col.findOne({ discogsId: key });
  }

  async writeBatch(docs: AlbumDoc[]): Promise<BatchWriteResult> {
    if (docs.length === 0) {
      return { committed: [], failed: [] };
    }

    const col = await this.getCollection();
    const ops: AnyBulkWriteOperation<AlbumDoc>[] = docs.map((doc) => ({
      updateOne: {
        filter: { discogsId: doc.discogsId },
        update: { $setOnInsert: doc },
        upsert: true
      }
    }));

    return runBatchWrite(
      docs.map((doc) => doc.discogsId),
      () => col.bulkWrite(ops, { ordered: false })
    );
  }
}
