import { randomUUID } from "crypto";
import type { AlbumDoc, AlbumSupport, DiscogsRelease } from "./catalog.types";

export class InvalidReleaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidReleaseError";
  }
}

const cleanList = (values: string[]): string[] =>
  values.map((value) => value.trim()).filter((value) => value.length > 0);

/**
 * Maps the first listed format onto the coarse support the library tracks.
 * "LP" counts as vinyl; file releases count as digital.
 */
export const deriveSupport = (formats: string[]): AlbumSupport => {
  const first = formats[0];
  if (first == null) return "Unknown";
  if (first.includes("Vinyl") || first.includes("LP")) return "Vinyl";
  if (first.includes("CD")) return "CD";
  if (first.includes("Digital") || first.includes("File")) return "Digital";
  return "Unknown";
};

export const transformRelease = (release: DiscogsRelease, now: () => Date = () => new Date()): AlbumDoc => {
  const title = release.title.trim();
  if (title.length === 0) {
    throw new InvalidReleaseError(`Invalid release ${release.id}: missing title`);
  }

  const artists = Array.from(new Set(cleanList(release.artists)));
  if (artists.length === 0) {
    throw new InvalidReleaseError(`Invalid release ${release.id}: no artist`);
  }

  return {
    _id: randomUUID(),
    discogsId: String(release.id),
    title,
    year: release.year != null && Number.isInteger(release.year) && release.year > 0 ? release.year : null,
    support: deriveSupport(release.formats),
    artists,
    labels: cleanList(release.labels),
    genres: cleanList(release.genres),
    styles: cleanList(release.styles),
    coverImage: release.coverImage,
    discogsUrl: release.uri,
    source: "discogs",
    importedAt: now()
  };
};
