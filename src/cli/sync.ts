#!/usr/bin/env node
import { runSync } from "../composition/root";
import { isSyncKind, syncKinds, type SyncKind } from "../core/jobs/JobProgress";

type ErrorContext = Partial<{
  kind: string;
  page: number;
  naturalKey: string;
  current: number;
}>;

type CliErrorEnvelope = {
  event: "sync.failed";
  name: string;
  message: string;
  code?: string;
  context?: ErrorContext;
  status?: number;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const sanitizedContext: ErrorContext = {};
  if (typeof value.kind === "string") sanitizedContext.kind = value.kind;
  if (typeof value.naturalKey === "string") sanitizedContext.naturalKey = value.naturalKey;
  if (typeof value.page === "number" && Number.isFinite(value.page)) sanitizedContext.page = value.page;
  if (typeof value.current === "number" && Number.isFinite(value.current)) sanitizedContext.current = value.current;

  return Object.keys(sanitizedContext).length > 0 ? sanitizedContext : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "sync.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (typeof errorRecord.status === "number" && Number.isFinite(errorRecord.status)) {
    envelope.status = errorRecord.status;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const parseCliArgs = (argv: string[]): { kind: SyncKind; limit?: number } => {
  const [kind, rawLimit] = argv;
  if (kind == null || !isSyncKind(kind)) {
    throw new Error(`Usage: sync <${syncKinds.join("|")}> [limit]`);
  }
  if (rawLimit == null) return { kind };

  const limit = Number(rawLimit);
  if (!/^\d+$/.test(rawLimit) || !Number.isSafeInteger(limit) || limit < 1) {
    throw new Error(`limit=${rawLimit} must be a positive integer`);
  }
  return { kind, limit };
};

export const executeSyncCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  try {
    const { kind, limit } = parseCliArgs(argv);
    await runSync(kind, { limit });
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeSyncCli();
}
