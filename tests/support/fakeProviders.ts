import type { CollectionItem, DiscogsRelease } from "../../src/core/catalog/catalog.types";
import type { Scrobble } from "../../src/core/history/history.types";
import type { CatalogProvider } from "../../src/ports/CatalogProvider";
import type { HistoryProvider } from "../../src/ports/HistoryProvider";
import type { ProviderPage } from "../../src/ports/ProviderClient";
import { RateLimitedError, TerminalClientError } from "../../src/shared/errors/provider.errors";

export const makeCollection = (count: number, firstId = 1): CollectionItem[] =>
  Array.from({ length: count }, (_, i) => ({ releaseId: firstId + i, title: `Album ${firstId + i}` }));

export const makeRelease = (id: number): DiscogsRelease => ({
  id,
  title: `Album ${id}`,
  year: 2001,
  artists: [`Artist ${id}`],
  labels: ["Test Label"],
  genres: ["Rock"],
  styles: ["Indie Rock"],
  formats: ["Vinyl"],
  coverImage: null,
  uri: `https://www.discogs.com/release/${id}`
});

export type FakeCatalogOptions = {
  rateLimitFromPage?: number;
  missingReleaseIds?: number[];
  pageFailures?: Map<number, Error>;
  detailFailures?: Map<number, Error>;
  reportTotal?: boolean;
};

/** Serves `items` page by page; unknown and missing releases answer like Discogs does (404). */
export class FakeCatalogProvider implements CatalogProvider {
  readonly pageCalls: number[] = [];
  readonly detailCalls: number[] = [];
  private readonly missing: Set<number>;

  constructor(
    private readonly items: CollectionItem[],
    private readonly opts: FakeCatalogOptions = {}
  ) {
    this.missing = new Set(opts.missingReleaseIds ?? []);
  }

  async fetchPage(page: number, pageSize: number): Promise<ProviderPage<CollectionItem>> {
    this.pageCalls.push(page);

    const failure = this.opts.pageFailures?.get(page);
    if (failure) throw failure;
    if (this.opts.rateLimitFromPage != null && page >= this.opts.rateLimitFromPage) {
      throw new RateLimitedError("Discogs request failed: 429", { provider: "Discogs", status: 429 });
    }

    const start = (page - 1) * pageSize;
    return {
      records: this.items.slice(start, start + pageSize),
      hasMore: start + pageSize < this.items.length,
      totalCount: this.opts.reportTotal === false ? undefined : this.items.length
    };
  }

  async fetchRelease(releaseId: number): Promise<DiscogsRelease> {
    this.detailCalls.push(releaseId);

    const failure = this.opts.detailFailures?.get(releaseId);
    if (failure) throw failure;
    if (this.missing.has(releaseId)) {
      throw new TerminalClientError("Discogs request failed: 404", { provider: "Discogs", status: 404 });
    }
    return makeRelease(releaseId);
  }
}

export const makeScrobble = (title: string, timestamp: number, artist = "Test Artist", album = "Test Album"): Scrobble => ({
  artist,
  album,
  title,
  timestamp
});

/** Serves pre-built pages; page N is `pages[N - 1]`. */
export class FakeHistoryProvider implements HistoryProvider {
  readonly pageCalls: number[] = [];

  constructor(private readonly pages: Scrobble[][]) {}

  async fetchPage(page: number): Promise<ProviderPage<Scrobble>> {
    this.pageCalls.push(page);
    return {
      records: this.pages[page - 1] ?? [],
      hasMore: page < this.pages.length,
      totalCount: this.pages.reduce((sum, records) => sum + records.length, 0)
    };
  }
}

export const noPace = async (): Promise<number> => 0;
