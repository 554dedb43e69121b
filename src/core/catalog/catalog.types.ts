/** One row of a collection page: enough to decide whether the release is already known. */
export type CollectionItem = {
  releaseId: number;
  title: string;
};

/** Release details, as returned by the per-item lookup. */
export type DiscogsRelease = {
  id: number;
  title: string;
  year: number | null;
  artists: string[];
  labels: string[];
  genres: string[];
  styles: string[];
  formats: string[];
  coverImage: string | null;
  uri: string | null;
};

export type AlbumSupport = "Vinyl" | "CD" | "Digital" | "Unknown";

export type AlbumDoc = {
  _id: string;          // UUIDv4
  discogsId: string;    // natural key
  title: string;
  year: number | null;
  support: AlbumSupport;
  artists: string[];
  labels: string[];
  genres: string[];
  styles: string[];
  coverImage: string | null;
  discogsUrl: string | null;
  source: "discogs";
  importedAt: Date;
};

export const catalogNaturalKey = (item: Pick<CollectionItem, "releaseId">): string => String(item.releaseId);
