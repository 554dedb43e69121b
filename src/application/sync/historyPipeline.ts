import { DeduplicationGuard } from "../../core/dedup/deduplicationGuard";
import { DEDUP_WINDOW_SECONDS, type ListeningEventDoc, type Scrobble } from "../../core/history/history.types";
import { scrobbleNaturalKey, trackKeyOf, transformScrobble } from "../../core/history/transformScrobble";
import type { HistoryProvider } from "../../ports/HistoryProvider";
import type { ListeningHistoryStore } from "../../ports/SyncStore";
import type { Pacer } from "../../shared/concurrency/pacer";
import type { SyncPipeline } from "./syncJob";

// Scrobbles carry everything a document needs, so there is no per-record call to save and
// no skip-set; reruns are caught as exact duplicates by the guard instead.
export const createHistoryPipeline = (deps: {
  provider: HistoryProvider;
  store: ListeningHistoryStore;
  pace: Pacer;
  windowSeconds?: number;
  now?: () => Date;
}): SyncPipeline<Scrobble, ListeningEventDoc> => {
  const { provider, store, pace } = deps;

  return {
    kind: "history",
    source: provider,
    store,
    guard: new DeduplicationGuard(store, deps.windowSeconds ?? DEDUP_WINDOW_SECONDS),
    pace,
    useSkipSet: false,
    naturalKeyOf: scrobbleNaturalKey,
    dedupSubjectOf: (scrobble) => ({
      naturalKey: scrobbleNaturalKey(scrobble),
      window: { trackKey: trackKeyOf(scrobble), timestamp: scrobble.timestamp }
    }),
    labelOf: (scrobble) => `${scrobble.artist} - ${scrobble.title}`,
    toDoc: async (scrobble) => transformScrobble(scrobble, deps.now)
  };
};
