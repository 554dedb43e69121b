import { randomUUID } from "crypto";
import type { ListeningEventDoc, Scrobble } from "./history.types";

export class InvalidScrobbleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidScrobbleError";
  }
}

const normalizePart = (value: string): string => value.trim().replace(/\s+/g, " ").toLowerCase();

/** Logical track identity: case- and whitespace-insensitive artist, album and title. */
export const trackKeyOf = (scrobble: Pick<Scrobble, "artist" | "album" | "title">): string =>
  [scrobble.artist, scrobble.album, scrobble.title].map(normalizePart).join("|");

export const scrobbleNaturalKey = (scrobble: Scrobble): string => `${trackKeyOf(scrobble)}@${scrobble.timestamp}`;

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatPlayedAt = (timestamp: number): string => {
  const d = new Date(timestamp * 1000);
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}`;
};

export const transformScrobble = (scrobble: Scrobble, now: () => Date = () => new Date()): ListeningEventDoc => {
  const title = scrobble.title.trim();
  if (title.length === 0) {
    throw new InvalidScrobbleError("Invalid scrobble: missing track title");
  }
  if (!Number.isSafeInteger(scrobble.timestamp) || scrobble.timestamp <= 0) {
    throw new InvalidScrobbleError(`Invalid scrobble: timestamp ${String(scrobble.timestamp)} is not a positive integer`);
  }

  return {
    _id: randomUUID(),
    naturalKey: scrobbleNaturalKey(scrobble),
    trackKey: trackKeyOf(scrobble),
    artist: scrobble.artist.trim(),
    album: scrobble.album.trim(),
    title,
    timestamp: scrobble.timestamp,
    date: formatPlayedAt(scrobble.timestamp),
    source: "lastfm",
    loved: false,
    importedAt: now()
  };
};
