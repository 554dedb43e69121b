import http from "http";
import type { CleanupResult } from "./application/sync/cleanHistoryDuplicates.usecase";
import type { SyncService } from "./application/sync/syncService";
import { isSyncKind } from "./core/jobs/JobProgress";
import { createAppContext } from "./composition/root";
import { toErrorMessage } from "./shared/errors/provider.errors";
import type { CircuitBreakerSnapshot } from "./shared/retry/circuitBreaker";

export type ServerDeps = {
  syncService: Pick<SyncService, "trigger" | "progress" | "cancel">;
  cleanHistory: () => Promise<CleanupResult>;
  breakerSnapshots: () => CircuitBreakerSnapshot[];
};

const sendJson = (res: http.ServerResponse, status: number, body: unknown) => {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
};

/** `undefined` when absent, `null` when present but not a positive integer. */
const parseLimit = (raw: string | null): number | undefined | null => {
  if (raw == null || raw === "") return undefined;
  if (!/^\d+$/.test(raw)) return null;
  const value = Number(raw);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
};

const SYNC_ROUTE = /^\/sync\/([^/]+)(?:\/(progress|cancel))?\/?$/;

export const createServer = (deps: ServerDeps) => {
  const handle = async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");

    if (url.pathname === "/health") {
      if (method !== "GET") return sendJson(res, 405, { error: "method_not_allowed" });
      return sendJson(res, 200, { ok: true, breakers: deps.breakerSnapshots() });
    }

    if (url.pathname === "/history/duplicates/clean") {
      if (method !== "POST") return sendJson(res, 405, { error: "method_not_allowed" });
      return sendJson(res, 200, await deps.cleanHistory());
    }

    const match = SYNC_ROUTE.exec(url.pathname);
    const kind = match?.[1];
    if (!match || kind == null || !isSyncKind(kind)) {
      return sendJson(res, 404, { error: "not_found" });
    }

    const action = match[2];
    if (action === "progress") {
      if (method !== "GET") return sendJson(res, 405, { error: "method_not_allowed" });
      return sendJson(res, 200, deps.syncService.progress(kind));
    }

    if (method !== "POST") return sendJson(res, 405, { error: "method_not_allowed" });

    if (action === "cancel") {
      const result = deps.syncService.cancel(kind);
      return sendJson(res, result.status === "cancelling" ? 202 : 409, result);
    }

    const limit = parseLimit(url.searchParams.get("limit"));
    if (limit === null) {
      return sendJson(res, 400, { error: "invalid_limit" });
    }

    const result = deps.syncService.trigger(kind, { limit });
    return sendJson(res, result.status === "started" ? 202 : 409, result);
  };

  return http.createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({ event: "http.request_failed", method: req.method, path: req.url, message: toErrorMessage(err) }));
      if (!res.headersSent) sendJson(res, 500, { error: "internal_error" });
      else res.end();
    });
  });
};

if (require.main === module) {
  const ctx = createAppContext();
  const server = createServer(ctx);

  server.listen(ctx.env.PORT, () => {
    console.log(JSON.stringify({ event: "server.listening", port: ctx.env.PORT }));
  });

  const shutdown = () => {
    server.close(() => {
      ctx.close().then(
        () => process.exit(0),
        (err: unknown) => {
          // eslint-disable-next-line no-console
          console.error(JSON.stringify({ event: "server.shutdown_failed", message: toErrorMessage(err) }));
          process.exit(1);
        }
      );
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}
