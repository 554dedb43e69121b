import {
  formatPlayedAt,
  InvalidScrobbleError,
  scrobbleNaturalKey,
  trackKeyOf,
  transformScrobble
} from "../../src/core/history/transformScrobble";

const importedAt = new Date("2026-03-01T10:00:00.000Z");

describe("transformScrobble", () => {
  it("maps a scrobble onto a listening event", () => {
    const doc = transformScrobble(
      { artist: " Test Artist ", album: "Test Album", title: "First Song ", timestamp: 1700000000 },
      () => importedAt
    );

    expect(doc).toEqual({
      _id: expect.any(String),
      naturalKey: "test artist|test album|first song@1700000000",
      trackKey: "test artist|test album|first song",
      artist: "Test Artist",
      album: "Test Album",
      title: "First Song",
      timestamp: 1700000000,
      date: "2023-11-14 22:13",
      source: "lastfm",
      loved: false,
      importedAt
    });
  });

  it("rejects scrobbles without a title or a usable timestamp", () => {
    expect(() => transformScrobble({ artist: "a", album: "b", title: "", timestamp: 1 })).toThrow(InvalidScrobbleError);
    expect(() => transformScrobble({ artist: "a", album: "b", title: "c", timestamp: 0 })).toThrow(
      "Invalid scrobble: timestamp 0 is not a positive integer"
    );
  });
});

describe("track identity", () => {
  it("ignores case and surrounding or repeated whitespace", () => {
    expect(trackKeyOf({ artist: "The  Band", album: " Album ", title: "SONG" })).toBe(
      trackKeyOf({ artist: "the band", album: "album", title: "song" })
    );
  });

  it("derives the natural key from identity and timestamp", () => {
    expect(scrobbleNaturalKey({ artist: "A", album: "B", title: "C", timestamp: 42 })).toBe("a|b|c@42");
  });

  it("formats play times in UTC", () => {
    expect(formatPlayedAt(0)).toBe("1970-01-01 00:00");
    expect(formatPlayedAt(1700000000)).toBe("2023-11-14 22:13");
  });
});
