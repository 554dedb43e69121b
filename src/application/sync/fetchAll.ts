import type { SyncKind } from "../../core/jobs/JobProgress";
import type { PageSource, ProviderPage } from "../../ports/ProviderClient";
import type { Pacer } from "../../shared/concurrency/pacer";
import { isTransientProviderFailure, RateLimitedError, toErrorMessage } from "../../shared/errors/provider.errors";

export type StopReason =
  | "exhausted"
  | "limit"
  | "rate_limited"
  | "page_loop"
  | "max_pages"
  | "transport_failure"
  | "cancelled";

export type FetchOutcome = {
  reason: StopReason;
  pagesFetched: number;
  yielded: number;
};

export type FetchAllOptions<TItem> = {
  kind: SyncKind;
  source: PageSource<TItem>;
  pageSize: number;
  skipSet: ReadonlySet<string>;
  naturalKeyOf: (item: TItem) => string;
  pace: Pacer;
  maxPages: number;
  limit?: number;
  signal?: AbortSignal;
  onPage?: (page: { page: number; records: number; totalCount?: number }) => void;
  onKnown?: (item: TItem, naturalKey: string) => void;
};

/**
 * Lazily walks the provider's pages, yielding only records whose natural key is not in
 * `skipSet`. Known records never leave this loop, so no detail call is spent on them.
 *
 * The generator's return value says why paging stopped. A rate limit, or a transport
 * failure once at least one page came through, ends paging early instead of failing;
 * anything else thrown by the source propagates.
 */
export async function* fetchAll<TItem>(opts: FetchAllOptions<TItem>): AsyncGenerator<TItem, FetchOutcome, void> {
  const { kind, source, pageSize, skipSet, naturalKeyOf, pace, maxPages, limit, signal } = opts;

  let page = 1;
  let pagesFetched = 0;
  let yielded = 0;
  const seenBoundaries = new Set<string>();

  const stop = (reason: StopReason, extra: Record<string, unknown> = {}): FetchOutcome => {
    if (reason !== "exhausted" && reason !== "limit") {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "sync.pagination_stopped", kind, reason, page, pagesFetched, yielded, ...extra }));
    }
    return { reason, pagesFetched, yielded };
  };

  while (true) {
    if (signal?.aborted) return stop("cancelled");
    if (pagesFetched >= maxPages) return stop("max_pages");

    await pace(signal);

    let result: ProviderPage<TItem>;
    try {
      result = await source.fetchPage(page, pageSize, signal);
    } catch (err) {
      if (err instanceof RateLimitedError) {
        return stop("rate_limited", { retryAfterMs: err.retryAfterMs ?? null });
      }
      if (isTransientProviderFailure(err) && pagesFetched > 0) {
        return stop("transport_failure", { error: toErrorMessage(err) });
      }
      throw err;
    }

    pagesFetched += 1;
    opts.onPage?.({ page, records: result.records.length, totalCount: result.totalCount });

    const first = result.records[0];
    const last = result.records[result.records.length - 1];
    if (first !== undefined && last !== undefined) {
      const boundary = `${naturalKeyOf(first)}..${naturalKeyOf(last)}`;
      if (seenBoundaries.has(boundary)) return stop("page_loop", { boundary });
      seenBoundaries.add(boundary);
    }

    for (const record of result.records) {
      const key = naturalKeyOf(record);
      if (skipSet.has(key)) {
        opts.onKnown?.(record, key);
        continue;
      }

      yield record;
      yielded += 1;
      if (limit != null && yielded >= limit) return stop("limit");
    }

    if (!result.hasMore || result.records.length === 0) return stop("exhausted");
    page += 1;
  }
}
