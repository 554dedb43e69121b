import { MongoClient, type Db } from "mongodb";

/**
 * One client shared by every store. Connects on first use; `close` is safe to call
 * whether or not a connection was ever opened.
 */
export class MongoConnection {
  private client?: MongoClient;
  private connecting?: Promise<Db>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName?: string,
    private readonly createClient: (uri: string) => MongoClient = (uri) => new MongoClient(uri)
  ) {}

  db(): Promise<Db> {
    if (!this.connecting) {
      const client = this.createClient(this.mongoUri);
      this.client = client;
      this.connecting = client.connect().then(
        () => client.db(this.dbName),
        (err: unknown) => {
          // Let the next call try again instead of caching the failure.
          this.client = undefined;
          this.connecting = undefined;
          throw err;
        }
      );
    }
    return this.connecting;
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    this.connecting = undefined;
    await client?.close();
  }
}
