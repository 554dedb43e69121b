import { createHistoryPipeline } from "../../src/application/sync/historyPipeline";
import { ProgressStore } from "../../src/application/sync/progressStore";
import { resolveSyncConfig } from "../../src/application/sync/sync.config";
import { runSyncJob } from "../../src/application/sync/syncJob";
import type { Scrobble } from "../../src/core/history/history.types";
import { transformScrobble } from "../../src/core/history/transformScrobble";
import { FakeHistoryProvider, makeScrobble, noPace } from "../support/fakeProviders";
import { InMemoryListeningHistoryStore } from "../support/inMemoryStores";

const runHistory = (pages: Scrobble[][], store: InMemoryListeningHistoryStore) => {
  const progress = new ProgressStore("history");
  progress.start();
  const run = runSyncJob({
    pipeline: createHistoryPipeline({ provider: new FakeHistoryProvider(pages), store, pace: noPace }),
    progress,
    config: resolveSyncConfig("history")
  });
  return { progress, run };
};

describe("history sync job", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it("drops plays of a stored track within the window and keeps later ones", async () => {
    const store = new InMemoryListeningHistoryStore();
    store.seed([transformScrobble(makeScrobble("Song", 1000))]);

    const { progress, run } = runHistory(
      [[makeScrobble("Song", 1300), makeScrobble("Song", 1700), makeScrobble("Song", 1000)]],
      store
    );
    const summary = await run;

    expect(summary.skippedByDecision).toEqual({ duplicate_window: 1, duplicate_exact: 1 });
    expect(progress.get()).toMatchObject({ status: "completed", current: 3, succeeded: 1, skipped: 2, errored: 0 });
    expect(Array.from(store.docs.values(), (doc) => doc.timestamp).sort()).toEqual([1000, 1700]);
  });

  it("catches repeats within one run before they are committed", async () => {
    const store = new InMemoryListeningHistoryStore();

    const { progress, run } = runHistory(
      [
        [makeScrobble("Song", 1000), makeScrobble("Song", 1300), makeScrobble("Other", 1000)],
        [makeScrobble("Song", 1700), makeScrobble("song ", 1700)]
      ],
      store
    );
    const summary = await run;

    expect(summary.skippedByDecision).toEqual({ duplicate_window: 1, duplicate_session: 1 });
    expect(progress.get()).toMatchObject({ status: "completed", current: 5, succeeded: 3, skipped: 2, pagesFetched: 2 });
    expect(store.batchSizes).toEqual([3]);
  });

  it("does not load a skip-set; reruns are caught as exact duplicates", async () => {
    const store = new InMemoryListeningHistoryStore();
    const existingNaturalKeys = jest.spyOn(store, "existingNaturalKeys");
    const pages = [[makeScrobble("A", 100), makeScrobble("B", 5000)]];

    await runHistory(pages, store).run;
    const second = runHistory(pages, store);
    const summary = await second.run;

    expect(existingNaturalKeys).not.toHaveBeenCalled();
    expect(summary.skippedByDecision).toEqual({ duplicate_exact: 2 });
    expect(store.docs.size).toBe(2);
  });

  it("counts an invalid scrobble as errored and continues", async () => {
    const store = new InMemoryListeningHistoryStore();

    const { progress, run } = runHistory([[makeScrobble("", 100), makeScrobble("Fine", 200)]], store);
    const summary = await run;

    expect(summary.erroredByCode).toEqual({ invalid_record: 1 });
    expect(progress.get()).toMatchObject({ status: "completed", current: 2, succeeded: 1, errored: 1 });
  });

  it("commits history in checkpoints of fifty", async () => {
    const store = new InMemoryListeningHistoryStore();
    const page = Array.from({ length: 120 }, (_, i) => makeScrobble(`Track ${i}`, 1000 + i));

    await runHistory([page], store).run;

    expect(store.batchSizes).toEqual([50, 50, 20]);
  });
});
