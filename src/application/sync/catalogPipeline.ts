import { catalogNaturalKey, type AlbumDoc, type CollectionItem } from "../../core/catalog/catalog.types";
import { transformRelease } from "../../core/catalog/transformRelease";
import { DeduplicationGuard } from "../../core/dedup/deduplicationGuard";
import type { CatalogProvider } from "../../ports/CatalogProvider";
import type { AlbumStore } from "../../ports/SyncStore";
import type { Pacer } from "../../shared/concurrency/pacer";
import type { SyncPipeline } from "./syncJob";

/**
 * Collection releases become album documents. Known releases are filtered out by the
 * skip-set before their detail lookup, which is the expensive call here.
 */
export const createCatalogPipeline = (deps: {
  provider: CatalogProvider;
  store: AlbumStore;
  pace: Pacer;
  now?: () => Date;
}): SyncPipeline<CollectionItem, AlbumDoc> => {
  const { provider, store, pace } = deps;

  return {
    kind: "catalog",
    source: provider,
    store,
    guard: new DeduplicationGuard(store),
    pace,
    useSkipSet: true,
    naturalKeyOf: catalogNaturalKey,
    dedupSubjectOf: (item) => ({ naturalKey: catalogNaturalKey(item) }),
    labelOf: (item) => item.title || `Release ${item.releaseId}`,
    toDoc: async (item, signal) => {
      await pace(signal);
      const release = await provider.fetchRelease(item.releaseId, signal);
      return transformRelease(release, deps.now);
    }
  };
};
