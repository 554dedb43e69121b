import { cleanHistoryDuplicates, type CleanupResult } from "../application/sync/cleanHistoryDuplicates.usecase";
import { createCatalogPipeline } from "../application/sync/catalogPipeline";
import { createHistoryPipeline } from "../application/sync/historyPipeline";
import { ProgressStore } from "../application/sync/progressStore";
import { resolveSyncConfig } from "../application/sync/sync.config";
import type { SyncRunSummary } from "../application/sync/sync.error-handler";
import { runSyncJob } from "../application/sync/syncJob";
import { SyncService, type SyncRunner } from "../application/sync/syncService";
import type { SyncKind } from "../core/jobs/JobProgress";
import { DiscogsHttpClient } from "../infrastructure/discogs/DiscogsHttpClient";
import { createProviderRetryPolicy } from "../infrastructure/http/providerRequest";
import { LastFmHttpClient } from "../infrastructure/lastfm/LastFmHttpClient";
import { MongoAlbumStore } from "../infrastructure/mongo/MongoAlbumStore";
import { MongoConnection } from "../infrastructure/mongo/MongoConnection";
import { MongoListeningHistoryStore } from "../infrastructure/mongo/MongoListeningHistoryStore";
import { createPacer } from "../shared/concurrency/pacer";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv, type BreakerConfig, type RuntimeConfig } from "../shared/config/runtime.config";
import { CircuitBreaker, type CircuitBreakerSnapshot } from "../shared/retry/circuitBreaker";

export type AppContext = {
  env: Env;
  runtime: RuntimeConfig;
  runners: Record<SyncKind, SyncRunner>;
  syncService: SyncService;
  cleanHistory: () => Promise<CleanupResult>;
  breakerSnapshots: () => CircuitBreakerSnapshot[];
  close: () => Promise<void>;
};

const createBreaker = (name: string, config: BreakerConfig): CircuitBreaker =>
  new CircuitBreaker(name, {
    ...config,
    onStateChange: (change) => {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "circuit.state_changed", ...change }));
    }
  });

/**
 * Builds the process-wide object graph: one breaker and one retry policy per provider,
 * one Mongo connection shared by both stores, and one SyncService.
 */
export const createAppContext = (
  env: Env = loadEnv(),
  runtime: RuntimeConfig = loadRuntimeConfigFromEnv()
): AppContext => {
  const connection = new MongoConnection(env.MONGO_URI, env.MONGO_DB_NAME);
  const albumStore = new MongoAlbumStore(connection);
  const historyStore = new MongoListeningHistoryStore(connection);

  const discogsBreaker = createBreaker("Discogs", runtime.breaker);
  const lastFmBreaker = createBreaker("Last.fm", runtime.breaker);

  const discogs = new DiscogsHttpClient(
    {
      baseUrl: env.DISCOGS_BASE_URL,
      username: env.DISCOGS_USERNAME,
      token: env.DISCOGS_TOKEN,
      timeoutMs: runtime.timeoutMs
    },
    createProviderRetryPolicy("Discogs", runtime.retry, discogsBreaker)
  );
  const lastFm = new LastFmHttpClient(
    {
      baseUrl: env.LASTFM_BASE_URL,
      username: env.LASTFM_USERNAME,
      apiKey: env.LASTFM_API_KEY,
      timeoutMs: runtime.timeoutMs
    },
    createProviderRetryPolicy("Last.fm", runtime.retry, lastFmBreaker)
  );

  const runners: Record<SyncKind, SyncRunner> = {
    catalog: ({ progress, config, signal }) =>
      runSyncJob({
        pipeline: createCatalogPipeline({
          provider: discogs,
          store: albumStore,
          pace: createPacer(config.minRequestIntervalMs)
        }),
        progress,
        config,
        signal
      }),
    history: ({ progress, config, signal }) =>
      runSyncJob({
        pipeline: createHistoryPipeline({
          provider: lastFm,
          store: historyStore,
          pace: createPacer(config.minRequestIntervalMs)
        }),
        progress,
        config,
        signal
      })
  };

  return {
    env,
    runtime,
    runners,
    syncService: new SyncService(runners, runtime.syncConfigs),
    cleanHistory: () => cleanHistoryDuplicates({ store: historyStore }),
    breakerSnapshots: () => [discogsBreaker.snapshot(), lastFmBreaker.snapshot()],
    close: () => connection.close()
  };
};

/** Runs one sync to the end in the foreground. Used by the CLI. */
export const runSync = async (kind: SyncKind, options: { limit?: number } = {}): Promise<SyncRunSummary> => {
  const ctx = createAppContext();
  const config = resolveSyncConfig(kind, { ...ctx.runtime.syncConfigs[kind], limit: options.limit });
  const progress = new ProgressStore(kind);
  progress.start();

  try {
    return await ctx.runners[kind]({ progress, config, signal: new AbortController().signal });
  } finally {
    await ctx.close();
  }
};
