import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ImageMetadataStore, METADATA_FILENAME } from "../imageMetadataStore.js";
import type { ImageBlobStore } from "../imageBlobStore.js";
import type { ImageRecord } from "../imageRecord.schema.js";

const NOW = new Date("2026-03-10T12:00:00.000Z");
const DAY_MS = 24 * 60 * 60 * 1000;

function record(id: string, overrides: Partial<ImageRecord> = {}): ImageRecord {
  return {
    id,
    sourceId: `src-${id}`,
    fullUrl: `https://images.example.com/${id}/full.jpg`,
    thumbnailUrl: `https://images.example.com/${id}/thumb.jpg`,
    author: "Test Photographer",
    downloadTrackingUrl: `https://api.example.com/photos/${id}/download`,
    cachedAt: new Date(NOW.getTime() - DAY_MS),
    tags: [],
    ...overrides,
  };
}

describe("ImageMetadataStore", () => {
  let cacheDir: string;

  beforeEach(async () => {
    cacheDir = await mkdtemp(path.join(os.tmpdir(), "image-store-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(cacheDir, { recursive: true, force: true });
  });

  const open = (extra: { sweepOnOpen?: boolean } = {}) =>
    ImageMetadataStore.open({ cacheDir, now: () => NOW, ...extra });

  it("starts empty when no metadata file exists", async () => {
    const store = await open();
    expect(store.size()).toBe(0);
    expect(store.get("missing")).toBeNull();
    expect(store.randomRecord()).toBeNull();
  });

  it("persists records and blobs across reopen", async () => {
    const store = await open();
    const bytes = new Uint8Array([1, 2, 3, 4]);
    await store.put(record("a", { titleQuery: "Team Standup", tags: ["office"] }), bytes);

    const reopened = await open();
    const loaded = reopened.get("a");
    expect(loaded?.titleQuery).toBe("Team Standup");
    expect(loaded?.tags).toEqual(["office"]);
    expect(loaded?.cachedAt.toISOString()).toBe("2026-03-09T12:00:00.000Z");
    expect(await reopened.readImage("a")).toEqual(bytes);
  });

  it("writes cachedAt as an ISO-8601 string", async () => {
    const store = await open();
    await store.put(record("a"));

    const raw: unknown = JSON.parse(await readFile(path.join(cacheDir, METADATA_FILENAME), "utf8"));
    expect(raw).toMatchObject({ a: { cachedAt: "2026-03-09T12:00:00.000Z" } });
  });

  it("upserts on repeated put", async () => {
    const store = await open();
    await store.put(record("a", { author: "First" }));
    await store.put(record("a", { author: "Second" }));

    expect(store.size()).toBe(1);
    expect(store.get("a")?.author).toBe("Second");
  });

  it("degrades to an empty store when metadata is corrupt", async () => {
    await writeFile(path.join(cacheDir, METADATA_FILENAME), "{not json");

    const store = await open();
    expect(store.size()).toBe(0);
    expect(console.warn).toHaveBeenCalledWith(
      "[image-store] metadata unreadable, starting empty",
      expect.objectContaining({ path: path.join(cacheDir, METADATA_FILENAME) })
    );
  });

  it("degrades to an empty store when a record fails the schema", async () => {
    await writeFile(
      path.join(cacheDir, METADATA_FILENAME),
      JSON.stringify({ a: { id: "a", fullUrl: "not a url" } })
    );

    const store = await open();
    expect(store.size()).toBe(0);
  });

  it("treats records older than seven days as expired", async () => {
    const store = await open();
    const fresh = record("fresh", { cachedAt: new Date(NOW.getTime() - 6 * DAY_MS) });
    const stale = record("stale", { cachedAt: new Date(NOW.getTime() - 8 * DAY_MS) });
    await store.put(fresh);
    await store.put(stale);

    expect(store.isExpired(fresh)).toBe(false);
    expect(store.isExpired(stale)).toBe(true);
    expect(store.stats()).toEqual({ total: 2, expired: 1 });
    expect(store.findCandidates(null).map((r) => r.id)).toEqual(["fresh"]);
  });

  it("purges expired records and their blobs", async () => {
    const store = await open();
    await store.put(record("fresh"), new Uint8Array([1]));
    await store.put(record("stale", { cachedAt: new Date(NOW.getTime() - 8 * DAY_MS) }), new Uint8Array([2]));

    const removed = await store.purgeExpired();

    expect(removed).toEqual(["stale"]);
    expect(store.get("stale")).toBeNull();
    expect(await store.readImage("fresh")).toEqual(new Uint8Array([1]));
    await expect(readFile(path.join(cacheDir, "stale.jpg"))).rejects.toThrow();

    const reopened = await open();
    expect(reopened.size()).toBe(1);
  });

  it("runs an initial sweep when opened with sweepOnOpen", async () => {
    const seed = await open();
    await seed.put(record("stale", { cachedAt: new Date(NOW.getTime() - 8 * DAY_MS) }));

    const store = await open({ sweepOnOpen: true });
    expect(await store.initialSweep).toEqual(["stale"]);
    expect(store.size()).toBe(0);
  });

  it("keeps a record refreshed by a put queued before the sweep ran", async () => {
    const store = await open();
    await store.put(record("a", { cachedAt: new Date(NOW.getTime() - 8 * DAY_MS) }));

    const refresh = store.put(record("a", { cachedAt: NOW }));
    const sweep = store.purgeExpired();
    await refresh;

    expect(await sweep).toEqual([]);
    expect(store.get("a")?.cachedAt).toEqual(NOW);
  });

  it("logs background sweep failures instead of throwing", async () => {
    const failingBlobs: ImageBlobStore = {
      write: async () => undefined,
      read: async () => null,
      remove: async () => {
        throw new Error("disk gone");
      },
    };
    const store = await ImageMetadataStore.open({ cacheDir, blobs: failingBlobs, now: () => NOW });
    await store.put(record("stale", { cachedAt: new Date(NOW.getTime() - 8 * DAY_MS) }));

    expect(await store.startBackgroundSweep()).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith("[image-store] background sweep failed", { msg: "disk gone" });

    // The write chain survives the failure
    await store.put(record("next"));
    expect(store.get("next")).not.toBeNull();
  });

  describe("findCandidates", () => {
    beforeEach(async () => {
      const store = await open();
      await store.put(record("party", { titleQuery: "Birthday Party", locationQuery: "New York" }));
      await store.put(record("gym", { titleQuery: "Morning Workout", tags: ["fitness"] }));
      await store.put(record("beach", { titleQuery: "Vacation", locationQuery: "Miami, FL" }));
    });

    it("matches on title words, tags and location", async () => {
      const store = await open();

      expect(store.findCandidates("birthday dinner").map((r) => r.id)).toEqual(["party"]);
      expect(store.findCandidates("fitness class").map((r) => r.id)).toEqual(["gym"]);
      expect(store.findCandidates("lunch", "miami").map((r) => r.id)).toEqual(["beach"]);
    });

    it("returns every live record when nothing is given to match on", async () => {
      const store = await open();
      expect(store.findCandidates("", null)).toHaveLength(3);
    });

    it("keeps records whose title contains the query across word boundaries", async () => {
      const store = await open();
      await store.put(record("offsite", { titleQuery: "team offsite" }));

      expect(store.findCandidates("am off").map((r) => r.id)).toEqual(["offsite"]);
    });

    it("ignores surrounding whitespace in stored locations", async () => {
      const store = await open();
      await store.put(record("padded", { titleQuery: "Dentist", locationQuery: "  Boston  " }));

      expect(store.findCandidates("lunch", "boston").map((r) => r.id)).toEqual(["padded"]);
    });
  });

  it("hands out copies that cannot change the stored record", async () => {
    const store = await open();
    await store.put(record("a", { tags: ["office"] }));

    const copy = store.get("a");
    copy?.cachedAt.setTime(0);
    copy?.tags.push("tampered");
    const [candidate] = store.findCandidates("", null);
    candidate.tags.length = 0;

    const stored = store.get("a");
    expect(stored?.cachedAt.toISOString()).toBe("2026-03-09T12:00:00.000Z");
    expect(stored?.tags).toEqual(["office"]);
    expect(store.stats()).toEqual({ total: 1, expired: 0 });
  });

  it("picks random records among live ones only", async () => {
    const store = await open();
    await store.put(record("stale", { cachedAt: new Date(NOW.getTime() - 8 * DAY_MS) }));
    await store.put(record("live"));

    expect(store.randomRecord(() => 0)?.id).toBe("live");
    expect(store.randomRecord(() => 0.999)?.id).toBe("live");
  });

  it("returns null bytes for unknown ids", async () => {
    const store = await open();
    expect(await store.readImage("nope")).toBeNull();
  });
});
