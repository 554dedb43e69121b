import { planWindowDuplicateRemoval } from "../../core/dedup/windowCleanup";
import { DEDUP_WINDOW_SECONDS } from "../../core/history/history.types";
import type { ListeningHistoryStore } from "../../ports/SyncStore";

export type CleanupResult = {
  scanned: number;
  removed: number;
};

/**
 * Removes stored listening events that repeat the same track within the dedup window,
 * keeping the earliest of each cluster. Covers history imported before window dedup existed.
 */
export const cleanHistoryDuplicates = async (deps: {
  store: ListeningHistoryStore;
  windowSeconds?: number;
}): Promise<CleanupResult> => {
  const events = await deps.store.listWindowedEvents();
  const ids = planWindowDuplicateRemoval(events, deps.windowSeconds ?? DEDUP_WINDOW_SECONDS);
  const removed = ids.length > 0 ? await deps.store.deleteByIds(ids) : 0;

  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ event: "history.duplicates_cleaned", scanned: events.length, removed }));
  return { scanned: events.length, removed };
};
