import { DEDUP_WINDOW_SECONDS } from "../history/history.types";

export type WindowedEvent = {
  _id: string;
  trackKey: string;
  timestamp: number;
};

/**
 * Plans which stored events to remove so that no two kept events of the same track are
 * closer than the window. Per track, in timestamp order, the first event is kept and every
 * event closer than the window to the last kept one is dropped.
 */
export const planWindowDuplicateRemoval = (
  events: WindowedEvent[],
  windowSeconds: number = DEDUP_WINDOW_SECONDS
): string[] => {
  const sorted = [...events].sort((a, b) =>
    a.trackKey === b.trackKey ? a.timestamp - b.timestamp : a.trackKey < b.trackKey ? -1 : 1
  );

  const toRemove: string[] = [];
  let lastKept: WindowedEvent | undefined;

  for (const event of sorted) {
    if (lastKept && lastKept.trackKey === event.trackKey && event.timestamp - lastKept.timestamp < windowSeconds) {
      toRemove.push(event._id);
      continue;
    }
    lastKept = event;
  }

  return toRemove;
};
