import type { HistoryProvider, Scrobble } from "../../ports/HistoryProvider";
import type { ProviderPage } from "../../ports/ProviderClient";
import {
  RateLimitedError,
  RetryableTransportError,
  TerminalClientError
} from "../../shared/errors/provider.errors";
import type { RetryPolicy } from "../../shared/retry/retry";
import { requestJson, toSafeRequestUrl } from "../http/providerRequest";

export type LastFmClientConfig = {
  baseUrl: string;
  username: string;
  apiKey: string;
  timeoutMs?: number;
};

const PROVIDER = "Last.fm";

// Last.fm answers some failures with HTTP 200 and an error code in the body.
const RATE_LIMIT_CODES = new Set([29]);
const TEMPORARY_CODES = new Set([8, 11, 16]);
const CREDENTIAL_CODES = new Set([4, 9, 10, 14, 26]);

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const textOf = (value: unknown): string | undefined => {
  if (typeof value === "string") return value;
  if (isRecord(value) && typeof value["#text"] === "string") return value["#text"];
  return undefined;
};

const toInt = (value: unknown): number | undefined => {
  const parsed = typeof value === "number" ? value : typeof value === "string" && /^\d+$/.test(value) ? Number(value) : NaN;
  return Number.isSafeInteger(parsed) ? parsed : undefined;
};

export const errorForBodyCode = (code: number, message: string, requestUrl: string): Error => {
  const text = `${PROVIDER} error ${code}: ${message}`;
  if (RATE_LIMIT_CODES.has(code)) return new RateLimitedError(text, { provider: PROVIDER, requestUrl });
  if (TEMPORARY_CODES.has(code)) return new RetryableTransportError(text, { provider: PROVIDER, requestUrl });
  const status = CREDENTIAL_CODES.has(code) ? 403 : 400;
  return new TerminalClientError(text, { provider: PROVIDER, status, requestUrl });
};

const parseScrobble = (entry: unknown): Scrobble | undefined => {
  if (!isRecord(entry)) return undefined;
  // The track currently playing has no timestamp yet.
  if (isRecord(entry["@attr"]) && entry["@attr"].nowplaying != null) return undefined;

  const date = entry.date;
  const timestamp = isRecord(date) ? toInt(date.uts) : undefined;
  if (timestamp == null || timestamp <= 0) return undefined;

  return {
    artist: textOf(entry.artist) ?? "Unknown",
    album: textOf(entry.album) ?? "Unknown",
    title: typeof entry.name === "string" ? entry.name : "Unknown",
    timestamp,
    playbackDate: textOf(date)
  };
};

export const parseRecentTracksPage = (json: unknown, page: number, requestUrl = ""): ProviderPage<Scrobble> => {
  if (isRecord(json) && typeof json.error === "number") {
    throw errorForBodyCode(json.error, typeof json.message === "string" ? json.message : "unknown error", requestUrl);
  }
  if (!isRecord(json) || !isRecord(json.recenttracks)) {
    throw new TerminalClientError(`${PROVIDER} recent tracks response is malformed`, { provider: PROVIDER, requestUrl });
  }

  const recent = json.recenttracks;
  // A single track comes back as an object rather than a one-element list.
  const rawTracks = Array.isArray(recent.track) ? recent.track : recent.track != null ? [recent.track] : [];
  const records = rawTracks.flatMap((entry) => {
    const scrobble = parseScrobble(entry);
    return scrobble ? [scrobble] : [];
  });

  const attr = isRecord(recent["@attr"]) ? recent["@attr"] : {};
  const totalPages = toInt(attr.totalPages);

  return {
    records,
    hasMore: totalPages != null ? page < totalPages : rawTracks.length > 0,
    totalCount: toInt(attr.total)
  };
};

export class LastFmHttpClient implements HistoryProvider {
  private readonly timeoutMs: number;

  constructor(
    private readonly config: LastFmClientConfig,
    private readonly retryPolicy: RetryPolicy
  ) {
    this.timeoutMs = config.timeoutMs ?? 10000;
  }

  async fetchPage(page: number, pageSize: number, signal?: AbortSignal): Promise<ProviderPage<Scrobble>> {
    const url = new URL(this.config.baseUrl);
    url.searchParams.set("method", "user.getrecenttracks");
    url.searchParams.set("user", this.config.username);
    url.searchParams.set("api_key", this.config.apiKey);
    url.searchParams.set("limit", String(Math.min(pageSize, 200)));
    url.searchParams.set("page", String(Math.max(1, page)));
    url.searchParams.set("format", "json");
    const redactParams = ["api_key"];

    // Body-level error codes are parsed inside the retried operation so temporary ones get retried too.
    return this.retryPolicy.execute(async () => {
      const json = await requestJson({ provider: PROVIDER, url, timeoutMs: this.timeoutMs, signal, redactParams });
      return parseRecentTracksPage(json, page, toSafeRequestUrl(url, redactParams));
    }, signal);
  }
}
