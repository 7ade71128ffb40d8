import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ImageProviderError } from "../../errors.js";
import { UnsplashClient } from "../unsplashClient.js";
import type { ProviderPhoto } from "../imageProvider.js";
import { MissingConfigError } from "../../../lib/config.js";

const photoJson = {
  id: "abc123",
  urls: {
    raw: "https://images.example.com/abc123?raw",
    full: "https://images.example.com/abc123?full",
    regular: "https://images.example.com/abc123?regular",
    small: "https://images.example.com/abc123?small",
    thumb: "https://images.example.com/abc123?thumb",
  },
  user: { name: "Test Photographer", links: { html: "https://example.com/@tester" } },
  links: { download_location: "https://api.unsplash.com/photos/abc123/download?ixid=xyz" },
  tags: [{ title: "party" }, { title: "balloons" }],
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const fetchMock = vi.fn<typeof fetch>();

function requestedUrl(call: number): string {
  return String(fetchMock.mock.calls[call][0]);
}

describe("UnsplashClient", () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  const client = () => new UnsplashClient({ accessKey: "test-key", backoffs: [0] });

  it("fetches and normalizes a random photo", async () => {
    fetchMock.mockResolvedValueOnce(json(photoJson));

    const photo = await client().fetchRandomPhoto("birthday party");

    expect(requestedUrl(0)).toBe(
      "https://api.unsplash.com/photos/random?query=birthday+party&client_id=test-key"
    );
    expect(photo).toEqual({
      sourceId: "abc123",
      fullUrl: "https://images.example.com/abc123?regular",
      thumbnailUrl: "https://images.example.com/abc123?thumb",
      author: "Test Photographer",
      authorUrl: "https://example.com/@tester",
      downloadTrackingUrl: "https://api.unsplash.com/photos/abc123/download?ixid=xyz",
      tags: ["party", "balloons"],
    });
  });

  it("searches with paging parameters", async () => {
    const untagged = { ...photoJson, id: "def456", tags: undefined };
    fetchMock.mockResolvedValueOnce(json({ results: [photoJson, untagged], total: 2, total_pages: 1 }));

    const photos = await client().searchPhotos("beach", { perPage: 5 });

    expect(requestedUrl(0)).toBe(
      "https://api.unsplash.com/search/photos?query=beach&page=1&per_page=5&client_id=test-key"
    );
    expect(photos.map((p) => p.sourceId)).toEqual(["abc123", "def456"]);
    expect(photos[1].tags).toEqual([]);
  });

  it("retries server errors before succeeding", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("upstream busy", { status: 503 }))
      .mockResolvedValueOnce(json(photoJson));

    const photo = await client().fetchRandomPhoto("beach");

    expect(photo.sourceId).toBe("abc123");
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledWith("[image-provider] retrying", {
      attempt: 1,
      errorClass: "provider_server",
      backoffMs: 0,
    });
  });

  it("does not retry a rejected key", async () => {
    fetchMock.mockResolvedValueOnce(new Response("OAuth error", { status: 401 }));

    const error = await client()
      .fetchRandomPhoto("beach")
      .catch((e: unknown) => e);

    if (!(error instanceof ImageProviderError)) throw new Error("expected an ImageProviderError");
    expect(error.status).toBe(401);
    expect(error.message).toBe("Unsplash /photos/random failed (401): OAuth error");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects payloads that do not match the photo shape", async () => {
    fetchMock.mockResolvedValueOnce(json({ id: "abc123" }));

    await expect(client().fetchRandomPhoto("beach")).rejects.toThrow(
      "Unexpected Unsplash response from /photos/random (urls: Required)"
    );
  });

  it("downloads image bytes", async () => {
    fetchMock.mockResolvedValueOnce(new Response(new Uint8Array([1, 2, 3])));

    const bytes = await client().downloadBytes("https://images.example.com/abc123?regular");

    expect(bytes).toEqual(new Uint8Array([1, 2, 3]));
    expect(requestedUrl(0)).toBe("https://images.example.com/abc123?regular");
  });

  it("treats an empty image body as a failure", async () => {
    fetchMock.mockResolvedValueOnce(new Response(new Uint8Array([])));

    await expect(client().downloadBytes("https://images.example.com/empty")).rejects.toThrow(
      "Image download returned an empty body"
    );
  });

  it("tracks downloads against the download location", async () => {
    fetchMock.mockResolvedValueOnce(json({ url: "https://images.example.com/abc123" }));

    const photo: ProviderPhoto = {
      sourceId: "abc123",
      fullUrl: "https://images.example.com/abc123?regular",
      thumbnailUrl: "https://images.example.com/abc123?thumb",
      author: "Test Photographer",
      downloadTrackingUrl: "https://api.unsplash.com/photos/abc123/download?ixid=xyz",
      tags: [],
    };
    await client().trackDownload(photo);

    expect(requestedUrl(0)).toBe(
      "https://api.unsplash.com/photos/abc123/download?ixid=xyz&client_id=test-key"
    );
  });

  it("requires an access key when none is configured", async () => {
    vi.stubEnv("UNSPLASH_ACCESS_KEY", "");

    await expect(new UnsplashClient().fetchRandomPhoto("beach")).rejects.toBeInstanceOf(MissingConfigError);
    expect(fetchMock).not.toHaveBeenCalled();
    vi.unstubAllEnvs();
  });
});
