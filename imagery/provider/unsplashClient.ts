import { z } from "zod";
import { requireEnv } from "../../lib/config.js";
import { ImageProviderError } from "../errors.js";
import type { ImageProvider, ProviderPhoto, SearchOptions } from "./imageProvider.js";
import { withRetry } from "./retryPolicy.js";

export const UNSPLASH_BASE_URL = "https://api.unsplash.com";

const UnsplashPhotoSchema = z.object({
  id: z.string(),
  urls: z.object({
    raw: z.string(),
    full: z.string(),
    regular: z.string(),
    small: z.string(),
    thumb: z.string(),
  }),
  user: z.object({
    name: z.string(),
    links: z.object({ html: z.string() }),
  }),
  links: z.object({ download_location: z.string() }),
  tags: z.array(z.object({ title: z.string() })).optional(),
});

const UnsplashSearchResponseSchema = z.object({
  results: z.array(UnsplashPhotoSchema),
  total: z.number(),
  total_pages: z.number(),
});

export type UnsplashPhoto = z.infer<typeof UnsplashPhotoSchema>;

export type UnsplashClientOptions = {
  /** Falls back to UNSPLASH_ACCESS_KEY, read on first request. */
  accessKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  backoffs?: number[];
};

export function toProviderPhoto(photo: UnsplashPhoto): ProviderPhoto {
  return {
    sourceId: photo.id,
    fullUrl: photo.urls.regular,
    thumbnailUrl: photo.urls.thumb,
    author: photo.user.name,
    authorUrl: photo.user.links.html,
    downloadTrackingUrl: photo.links.download_location,
    tags: photo.tags?.map((t) => t.title) ?? [],
  };
}

export class UnsplashClient implements ImageProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: UnsplashClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? UNSPLASH_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async fetchRandomPhoto(query: string): Promise<ProviderPhoto> {
    const params: Record<string, string> = {};
    if (query) params.query = query;

    const body = await this.getJson("/photos/random", params);
    return toProviderPhoto(parseBody(UnsplashPhotoSchema, body, "/photos/random"));
  }

  async searchPhotos(query: string, options: SearchOptions = {}): Promise<ProviderPhoto[]> {
    const body = await this.getJson("/search/photos", {
      query,
      page: String(options.page ?? 1),
      per_page: String(options.perPage ?? 10),
    });
    const response = parseBody(UnsplashSearchResponseSchema, body, "/search/photos");
    return response.results.map(toProviderPhoto);
  }

  async downloadBytes(url: string): Promise<Uint8Array> {
    return this.withProviderRetry(async () => {
      const res = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      await assertOk(res, "Image download");

      const buf = await res.arrayBuffer();
      if (buf.byteLength === 0) {
        throw new ImageProviderError("Image download returned an empty body");
      }
      return new Uint8Array(buf);
    });
  }

  /**
   * Single attempt; callers treat tracking as best-effort.
   */
  async trackDownload(photo: Pick<ProviderPhoto, "sourceId" | "downloadTrackingUrl">): Promise<void> {
    const url = new URL(photo.downloadTrackingUrl || `/photos/${photo.sourceId}/download`, this.baseUrl);
    url.searchParams.set("client_id", this.accessKey());

    const res = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    await assertOk(res, "Download tracking");
  }

  private accessKey(): string {
    return this.options.accessKey ?? requireEnv("UNSPLASH_ACCESS_KEY");
  }

  private async getJson(path: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set("client_id", this.accessKey());

    return this.withProviderRetry(async () => {
      const res = await fetch(url, {
        headers: { "Accept-Version": "v1" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      await assertOk(res, `Unsplash ${path}`);

      const body: unknown = await res.json();
      return body;
    });
  }

  private withProviderRetry<T>(operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, {
      backoffs: this.options.backoffs,
      onRetry: ({ attempt, errorClass, backoffMs }) => {
        console.warn("[image-provider] retrying", { attempt, errorClass, backoffMs });
      },
    });
  }
}

async function assertOk(res: Response, what: string): Promise<void> {
  if (res.ok) return;
  const errText = await res.text().catch(() => "");
  throw new ImageProviderError(`${what} failed (${res.status}): ${errText.slice(0, 200)}`, res.status);
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, path: string): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue";
    throw new ImageProviderError(`Unexpected Unsplash response from ${path} (${where})`);
  }
  return parsed.data;
}
