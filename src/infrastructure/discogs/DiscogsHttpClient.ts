import type { CatalogProvider, CollectionItem, DiscogsRelease } from "../../ports/CatalogProvider";
import type { ProviderPage } from "../../ports/ProviderClient";
import { TerminalClientError } from "../../shared/errors/provider.errors";
import type { RetryPolicy } from "../../shared/retry/retry";
import { requestJson } from "../http/providerRequest";

export type DiscogsClientConfig = {
  baseUrl: string;
  username: string;
  token: string;
  timeoutMs?: number;
  userAgent?: string;
};

const PROVIDER = "Discogs";

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asPositiveInt = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isSafeInteger(value) && value > 0 ? value : undefined;

const asString = (value: unknown): string | undefined => (typeof value === "string" ? value : undefined);

/** Names out of `[{ name: "..." }]` lists; anything else is dropped. */
const namesOf = (value: unknown): string[] => {
  if (!Array.isArray(value)) return [];
  return value.flatMap((entry) => {
    const name = isRecord(entry) ? asString(entry.name) : undefined;
    return name ? [name] : [];
  });
};

const stringsOf = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === "string") : [];

const malformed = (what: string) =>
  new TerminalClientError(`${PROVIDER} ${what} response is malformed`, { provider: PROVIDER });

export const parseCollectionPage = (json: unknown, page: number): ProviderPage<CollectionItem> => {
  if (!isRecord(json) || !Array.isArray(json.releases)) throw malformed("collection");

  const records = json.releases.flatMap((entry): CollectionItem[] => {
    if (!isRecord(entry)) return [];
    const releaseId = asPositiveInt(entry.id);
    if (releaseId == null) return [];
    const info = isRecord(entry.basic_information) ? entry.basic_information : {};
    return [{ releaseId, title: asString(info.title) ?? "" }];
  });

  const pagination = isRecord(json.pagination) ? json.pagination : {};
  const pages = asPositiveInt(pagination.pages);
  const items = typeof pagination.items === "number" && pagination.items >= 0 ? pagination.items : undefined;

  return {
    records,
    hasMore: pages != null ? page < pages : records.length > 0,
    totalCount: items
  };
};

export const parseRelease = (json: unknown): DiscogsRelease => {
  if (!isRecord(json)) throw malformed("release");
  const id = asPositiveInt(json.id);
  if (id == null) throw malformed("release");

  const images = Array.isArray(json.images) ? json.images.filter(isRecord) : [];
  const primary = images.find((image) => image.type === "primary") ?? images[0];

  return {
    id,
    title: asString(json.title) ?? "",
    year: typeof json.year === "number" ? json.year : null,
    artists: namesOf(json.artists),
    labels: namesOf(json.labels),
    genres: stringsOf(json.genres),
    styles: stringsOf(json.styles),
    formats: namesOf(json.formats),
    coverImage: primary ? asString(primary.uri) ?? null : null,
    uri: asString(json.uri) ?? null
  };
};

/**
 * Discogs collection client. Each call goes through the provider retry policy, which
 * consults the Discogs circuit breaker before every attempt.
 */
export class DiscogsHttpClient implements CatalogProvider {
  private readonly timeoutMs: number;

  constructor(
    private readonly config: DiscogsClientConfig,
    private readonly retryPolicy: RetryPolicy
  ) {
    this.timeoutMs = config.timeoutMs ?? 15000;
  }

  private headers(): Record<string, string> {
    return {
      "User-Agent": this.config.userAgent ?? "MusicLibrarySync/1.0",
      Authorization: `Discogs token=${this.config.token}`,
      Accept: "application/json"
    };
  }

  private buildUrl(path: string): URL {
    const url = new URL(this.config.baseUrl);
    const base = url.pathname.endsWith("/") ? url.pathname.slice(0, -1) : url.pathname;
    url.pathname = `${base}${path}`;
    return url;
  }

  async fetchPage(page: number, pageSize: number, signal?: AbortSignal): Promise<ProviderPage<CollectionItem>> {
    const url = this.buildUrl(`/users/${encodeURIComponent(this.config.username)}/collection/folders/0/releases`);
    url.searchParams.set("page", String(page));
    url.searchParams.set("per_page", String(pageSize));

    const json = await this.retryPolicy.execute(
      () => requestJson({ provider: PROVIDER, url, headers: this.headers(), timeoutMs: this.timeoutMs, signal }),
      signal
    );
    return parseCollectionPage(json, page);
  }

  async fetchRelease(releaseId: number, signal?: AbortSignal): Promise<DiscogsRelease> {
    const url = this.buildUrl(`/releases/${releaseId}`);
    const json = await this.retryPolicy.execute(
      () => requestJson({ provider: PROVIDER, url, headers: this.headers(), timeoutMs: this.timeoutMs, signal }),
      signal
    );
    return parseRelease(json);
  }
}
