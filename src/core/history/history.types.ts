export type Scrobble = {
  artist: string;
  album: string;
  title: string;
  timestamp: number;      // unix seconds
  playbackDate?: string;  // provider's display text, informational only
};

export type ListeningEventDoc = {
  _id: string;            // UUIDv4
  naturalKey: string;     // `${trackKey}@${timestamp}`
  trackKey: string;
  artist: string;
  album: string;
  title: string;
  timestamp: number;
  date: string;           // YYYY-MM-DD HH:MM, UTC
  source: "lastfm";
  loved: boolean;
  importedAt: Date;
};

/** Two plays of the same track closer than this are one physical play reported twice. */
export const DEDUP_WINDOW_SECONDS = 600;
