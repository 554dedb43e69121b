import {
  defaultSyncConfigs,
  syncCaps,
  validateSyncConfig,
  type SyncConfig
} from "../../application/sync/sync.config";
import type { SyncKind } from "../../core/jobs/JobProgress";
import { defaultCircuitBreakerOptions } from "../retry/circuitBreaker";
import { defaultRetryPolicyConfig, type RetryPolicyConfig } from "../retry/retry";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 60000 },
  retryMaxAttempts: { min: 1, max: 10 },
  retryInitialDelayMs: { min: 0, max: 60000 },
  retryMaxDelayMs: { min: 0, max: 300000 },
  breakerFailureThreshold: { min: 1, max: 100 },
  breakerSuccessThreshold: { min: 1, max: 100 },
  breakerRecoveryTimeoutMs: { min: 1000, max: 3600000 }
} as const;

export type BreakerConfig = {
  failureThreshold: number;
  successThreshold: number;
  recoveryTimeoutMs: number;
};

export type RuntimeConfig = {
  syncConfigs: Record<SyncKind, SyncConfig>;
  timeoutMs: number;
  retry: RetryPolicyConfig;
  breaker: BreakerConfig;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const loadSyncConfig = (env: NodeJS.ProcessEnv, kind: SyncKind): SyncConfig => {
  const prefix = `SYNC_${kind.toUpperCase()}`;
  const defaults = defaultSyncConfigs[kind];

  return validateSyncConfig({
    pageSize: parseOptionalIntInRange(env, `${prefix}_PAGE_SIZE`, syncCaps.pageSize) ?? defaults.pageSize,
    checkpointSize:
      parseOptionalIntInRange(env, `${prefix}_CHECKPOINT_SIZE`, syncCaps.checkpointSize) ?? defaults.checkpointSize,
    maxPages: parseOptionalIntInRange(env, `${prefix}_MAX_PAGES`, syncCaps.maxPages) ?? defaults.maxPages,
    minRequestIntervalMs:
      parseOptionalIntInRange(env, `${prefix}_MIN_INTERVAL_MS`, syncCaps.minRequestIntervalMs) ??
      defaults.minRequestIntervalMs
  });
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const timeoutMs = parseOptionalIntInRange(env, "HTTP_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 15000;

  const retry: RetryPolicyConfig = {
    ...defaultRetryPolicyConfig,
    maxAttempts:
      parseOptionalIntInRange(env, "RETRY_MAX_ATTEMPTS", runtimeCaps.retryMaxAttempts) ??
      defaultRetryPolicyConfig.maxAttempts,
    initialDelayMs:
      parseOptionalIntInRange(env, "RETRY_INITIAL_DELAY_MS", runtimeCaps.retryInitialDelayMs) ??
      defaultRetryPolicyConfig.initialDelayMs,
    maxDelayMs:
      parseOptionalIntInRange(env, "RETRY_MAX_DELAY_MS", runtimeCaps.retryMaxDelayMs) ??
      defaultRetryPolicyConfig.maxDelayMs
  };
  if (retry.maxDelayMs < retry.initialDelayMs) {
    throw new Error(
      `RETRY_MAX_DELAY_MS=${retry.maxDelayMs} must be >= RETRY_INITIAL_DELAY_MS=${retry.initialDelayMs}`
    );
  }

  const breaker: BreakerConfig = {
    failureThreshold:
      parseOptionalIntInRange(env, "BREAKER_FAILURE_THRESHOLD", runtimeCaps.breakerFailureThreshold) ??
      defaultCircuitBreakerOptions.failureThreshold,
    successThreshold:
      parseOptionalIntInRange(env, "BREAKER_SUCCESS_THRESHOLD", runtimeCaps.breakerSuccessThreshold) ??
      defaultCircuitBreakerOptions.successThreshold,
    recoveryTimeoutMs:
      parseOptionalIntInRange(env, "BREAKER_RECOVERY_TIMEOUT_MS", runtimeCaps.breakerRecoveryTimeoutMs) ??
      defaultCircuitBreakerOptions.recoveryTimeoutMs
  };

  return {
    syncConfigs: {
      catalog: loadSyncConfig(env, "catalog"),
      history: loadSyncConfig(env, "history")
    },
    timeoutMs,
    retry,
    breaker
  };
};
