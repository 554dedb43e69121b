export type Env = {
  MONGO_URI: string;
  MONGO_DB_NAME?: string;
  DISCOGS_BASE_URL: string;
  DISCOGS_TOKEN: string;
  DISCOGS_USERNAME: string;
  LASTFM_BASE_URL: string;
  LASTFM_API_KEY: string;
  LASTFM_USERNAME: string;
  PORT: number;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const validatePort = (raw: string): number => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new Error(`PORT=${raw} is out of allowed range [0..65535]`);
  }
  return value;
};

const optional = (value: string | undefined): string | undefined => {
  const normalized = value?.trim();
  return normalized ? normalized : undefined;
};

/**
 * Connection settings and credentials. Credentials may be empty here; a sync of a kind
 * whose credentials are missing is rejected by the provider and ends in `error`.
 */
export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => ({
  MONGO_URI: env.MONGO_URI ?? "mongodb://localhost:27017/music_library",
  MONGO_DB_NAME: optional(env.MONGO_DB_NAME),
  DISCOGS_BASE_URL: validateHttpUrl("DISCOGS_BASE_URL", env.DISCOGS_BASE_URL ?? "https://api.discogs.com"),
  DISCOGS_TOKEN: env.DISCOGS_TOKEN ?? "",
  DISCOGS_USERNAME: env.DISCOGS_USERNAME ?? "",
  LASTFM_BASE_URL: validateHttpUrl("LASTFM_BASE_URL", env.LASTFM_BASE_URL ?? "https://ws.audioscrobbler.com/2.0/"),
  LASTFM_API_KEY: env.LASTFM_API_KEY ?? "",
  LASTFM_USERNAME: env.LASTFM_USERNAME ?? "",
  PORT: validatePort(env.PORT ?? "3000")
});
