import type { SyncKind } from "../../core/jobs/JobProgress";

export type SyncConfig = {
  pageSize: number;
  checkpointSize: number;
  maxPages: number;
  minRequestIntervalMs: number;
  limit?: number;
};

export type SyncConfigInput = Partial<SyncConfig>;

export const defaultSyncConfigs: Record<SyncKind, SyncConfig> = {
  catalog: {
    pageSize: 100,
    checkpointSize: 5,
    maxPages: 1000,
    minRequestIntervalMs: 500
  },
  history: {
    pageSize: 200,
    checkpointSize: 50,
    maxPages: 10000,
    minRequestIntervalMs: 250
  }
};

export const syncCaps = {
  pageSize: { min: 1, max: 500 },
  checkpointSize: { min: 1, max: 1000 },
  maxPages: { min: 1, max: 100000 },
  minRequestIntervalMs: { min: 0, max: 60000 },
  limit: { min: 1, max: Number.MAX_SAFE_INTEGER }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateSyncConfig = (config: SyncConfig): SyncConfig => {
  assertIntegerInRange("pageSize", config.pageSize, syncCaps.pageSize.min, syncCaps.pageSize.max);
  assertIntegerInRange("checkpointSize", config.checkpointSize, syncCaps.checkpointSize.min, syncCaps.checkpointSize.max);
  assertIntegerInRange("maxPages", config.maxPages, syncCaps.maxPages.min, syncCaps.maxPages.max);
  assertIntegerInRange(
    "minRequestIntervalMs",
    config.minRequestIntervalMs,
    syncCaps.minRequestIntervalMs.min,
    syncCaps.minRequestIntervalMs.max
  );
  if (config.limit != null) {
    assertIntegerInRange("limit", config.limit, syncCaps.limit.min, syncCaps.limit.max);
  }
  return config;
};

/** Per-kind defaults overlaid with the given values; undefined entries keep the default. */
export const resolveSyncConfig = (kind: SyncKind, input: SyncConfigInput = {}): SyncConfig => {
  const defaults = defaultSyncConfigs[kind];
  return validateSyncConfig({
    pageSize: input.pageSize ?? defaults.pageSize,
    checkpointSize: input.checkpointSize ?? defaults.checkpointSize,
    maxPages: input.maxPages ?? defaults.maxPages,
    minRequestIntervalMs: input.minRequestIntervalMs ?? defaults.minRequestIntervalMs,
    limit: input.limit
  });
};
