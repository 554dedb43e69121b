import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

/**
 * Index plan, applied lazily the first time a store touches its collection:
 * - albums: unique { discogsId: 1 }
 * - listening_history: unique { naturalKey: 1 }, plus { trackKey: 1, timestamp: 1 } for window lookups
 */
export const mongoIndexes: Record<"albums" | "listeningHistory", { keys: IndexSpecification; options: CreateIndexesOptions }[]> = {
  albums: [
    { keys: { discogsId: 1 }, options: { unique: true } }
  ],
  listeningHistory: [
    { keys: { naturalKey: 1 }, options: { unique: true } },
    { keys: { trackKey: 1, timestamp: 1 }, options: {} }
  ]
};
