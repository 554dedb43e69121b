export type SyncKind = "catalog" | "history";

export const syncKinds: readonly SyncKind[] = ["catalog", "history"];

export const isSyncKind = (value: string): value is SyncKind =>
  syncKinds.some((kind) => kind === value);

export type JobStatus = "idle" | "starting" | "running" | "completed" | "error";

export type JobProgress = {
  kind: SyncKind;
  status: JobStatus;
  current: number;
  total: number;
  succeeded: number;
  skipped: number;
  errored: number;
  pagesFetched: number;
  currentItemLabel: string;
  message: string | null;
  startedAt: string | null;   // ISO-8601
  finishedAt: string | null;  // ISO-8601
};

/** Forward-only lifecycle; a finished job only leaves its terminal state through a new trigger. */
export const allowedTransitions: Record<JobStatus, readonly JobStatus[]> = {
  idle: ["starting"],
  starting: ["running", "error"],
  running: ["completed", "error"],
  completed: ["starting"],
  error: ["starting"]
};

export const isTerminalStatus = (status: JobStatus): boolean => status === "completed" || status === "error";

export const isActiveStatus = (status: JobStatus): boolean => status === "starting" || status === "running";

export const createIdleProgress = (kind: SyncKind): JobProgress => ({
  kind,
  status: "idle",
  current: 0,
  total: 0,
  succeeded: 0,
  skipped: 0,
  errored: 0,
  pagesFetched: 0,
  currentItemLabel: "",
  message: null,
  startedAt: null,
  finishedAt: null
});
