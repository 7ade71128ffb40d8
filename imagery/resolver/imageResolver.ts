import crypto from "crypto";
import { imageryLog, imageryLogHelpers } from "../../logging/imageryLog.js";
import { UnknownImageError } from "../errors.js";
import { buildSearchQuery } from "../matching/buildSearchQuery.js";
import {
  AUTO_ACCEPT_THRESHOLD,
  GOOD_ENOUGH_THRESHOLD,
  rankBySimilarity,
} from "../matching/similarityMatcher.js";
import type { ImageProvider, ProviderPhoto } from "../provider/imageProvider.js";
import { classifyError } from "../provider/retryPolicy.js";
import { RequestQueue } from "../queue/requestQueue.js";
import type { ImageMetadataStore } from "../store/imageMetadataStore.js";
import type { ImageRecord } from "../store/imageRecord.schema.js";
import { withAssignedImage, type CalendarEventRef } from "./calendarEventRef.js";

/**
 * `event` is a copy carrying the assignment; the caller's object is never
 * touched. A null imageId means "show a placeholder".
 */
export type ResolveResult = {
  imageId: string | null;
  event: CalendarEventRef;
};

export type ResolveOptions = {
  /** Ignore the current assignment and pick again. */
  reassign?: boolean;
};

export type ImageResolverDeps = {
  store: ImageMetadataStore;
  provider: ImageProvider;
  /** Provider work; every job resolves to the records it produced. */
  queue?: RequestQueue<ImageRecord[]>;
  newId?: () => string;
  now?: () => Date;
};

export class ImageResolver {
  private readonly store: ImageMetadataStore;
  private readonly provider: ImageProvider;
  private readonly queue: RequestQueue<ImageRecord[]>;
  private readonly newId: () => string;
  private readonly now: () => Date;

  constructor(deps: ImageResolverDeps) {
    this.store = deps.store;
    this.provider = deps.provider;
    this.queue = deps.queue ?? new RequestQueue<ImageRecord[]>();
    this.newId = deps.newId ?? (() => crypto.randomUUID());
    this.now = deps.now ?? (() => new Date());
  }

  async resolve(event: CalendarEventRef, options: ResolveOptions = {}): Promise<ResolveResult> {
    const assigned = event.assignedImageId;
    if (!options.reassign && assigned && this.store.get(assigned)) {
      imageryLog({ event: "image.resolve.assigned_hit", image_id: assigned });
      return { imageId: assigned, event };
    }

    const title = event.title;
    const location = event.location;
    const candidates = this.store.findCandidates(title, location);
    const [best] = rankBySimilarity(candidates, title, location, "resolution", candidates.length);

    if (best && best.score >= AUTO_ACCEPT_THRESHOLD) {
      imageryLogHelpers.matched({ image_id: best.record.id, match_kind: "auto_accept", score: best.score });
      return this.assigned(event, best.record.id);
    }

    const exact = candidates.find(
      (r) =>
        r.titleQuery?.toLowerCase() === title.toLowerCase() &&
        r.locationQuery === location &&
        !this.store.isExpired(r)
    );
    if (exact) {
      imageryLogHelpers.matched({ image_id: exact.id, match_kind: "exact", score: best?.score ?? 0 });
      return this.assigned(event, exact.id);
    }

    if (best && best.score > GOOD_ENOUGH_THRESHOLD) {
      imageryLogHelpers.matched({ image_id: best.record.id, match_kind: "good_enough", score: best.score });
      return this.assigned(event, best.record.id);
    }

    return this.fetchNewImage(event);
  }

  /**
   * Explicit reassignment. Throws UnknownImageError for ids the store does
   * not hold.
   */
  assign(event: CalendarEventRef, imageId: string): CalendarEventRef {
    if (!this.store.get(imageId)) throw new UnknownImageError(imageId);
    return withAssignedImage(event, imageId);
  }

  /** Up to ten live records, best browsing match first. */
  findSimilarImages(title: string, location?: string | null): ImageRecord[] {
    return rankBySimilarity(this.store.findCandidates(null), title, location, "browsing").map(
      (ranked) => ranked.record
    );
  }

  /**
   * Provider search for manual selection. Results are not persisted; only
   * photos whose thumbnail downloaded are returned.
   */
  async searchImages(query: string): Promise<ImageRecord[]> {
    const requestId = `search_${this.newId()}`;

    try {
      const records = await this.queue.enqueue(requestId, async () => {
        const photos = await this.provider.searchPhotos(query);
        const thumbnails = await Promise.allSettled(
          photos.map((photo) => this.provider.downloadBytes(photo.thumbnailUrl))
        );
        return photos
          .filter((_, i) => thumbnails[i].status === "fulfilled")
          .map((photo) => this.toRecord(photo, { titleQuery: query }));
      });

      imageryLog({ event: "image.search.completed", request_id: requestId, query, count: records.length });
      return records;
    } catch (e) {
      const { errorClass, message } = classifyError(e);
      console.warn("[image-resolver] search failed", { requestId, query, errorClass, msg: message });
      return [];
    }
  }

  /**
   * Persist a record picked from `searchImages` and assign it.
   */
  async saveSelection(record: ImageRecord, event: CalendarEventRef): Promise<ResolveResult> {
    try {
      await this.queue.enqueue(`select_${record.id}`, async () => {
        const bytes = await this.provider.downloadBytes(record.fullUrl);
        await this.trackDownload(record.sourceId ?? "", record.downloadTrackingUrl);
        const saved = { ...record, cachedAt: this.now() };
        await this.store.put(saved, bytes);
        return [saved];
      });
    } catch (e) {
      const { errorClass, message } = classifyError(e);
      console.warn("[image-resolver] selection failed", { imageId: record.id, errorClass, msg: message });
      return { imageId: null, event };
    }

    return this.assigned(event, record.id);
  }

  queueStatus(): string {
    return this.queue.status();
  }

  private async fetchNewImage(event: CalendarEventRef): Promise<ResolveResult> {
    const requestId = `fetch_${this.newId()}`;
    const query = buildSearchQuery(event);
    imageryLog({ event: "image.resolve.fetch_queued", request_id: requestId, query });

    try {
      const [record] = await this.queue.enqueue(requestId, async () => {
        const photo = await this.provider.fetchRandomPhoto(query);
        const bytes = await this.provider.downloadBytes(photo.fullUrl);
        await this.trackDownload(photo.sourceId, photo.downloadTrackingUrl);

        const created = this.toRecord(photo, {
          titleQuery: event.title,
          locationQuery: event.location || undefined,
        });
        await this.store.put(created, bytes);
        return [created];
      });

      if (!record) return { imageId: null, event };

      imageryLogHelpers.fetchSucceeded({ request_id: requestId, image_id: record.id, query });
      return this.assigned(event, record.id);
    } catch (e) {
      const { errorClass, message } = classifyError(e);
      imageryLogHelpers.fetchFailed({ request_id: requestId, query, error_class: errorClass, error_message: message });
      return { imageId: null, event };
    }
  }

  private async trackDownload(sourceId: string, downloadTrackingUrl: string): Promise<void> {
    try {
      await this.provider.trackDownload({ sourceId, downloadTrackingUrl });
    } catch (e) {
      console.warn("[image-resolver] download tracking failed", {
        sourceId,
        msg: e instanceof Error ? e.message : String(e),
      });
    }
  }

  private toRecord(
    photo: ProviderPhoto,
    queries: { titleQuery?: string; locationQuery?: string }
  ): ImageRecord {
    return {
      id: this.newId(),
      sourceId: photo.sourceId,
      fullUrl: photo.fullUrl,
      thumbnailUrl: photo.thumbnailUrl,
      author: photo.author,
      authorUrl: photo.authorUrl,
      downloadTrackingUrl: photo.downloadTrackingUrl,
      cachedAt: this.now(),
      tags: photo.tags,
      titleQuery: queries.titleQuery,
      locationQuery: queries.locationQuery,
    };
  }

  private assigned(event: CalendarEventRef, imageId: string): ResolveResult {
    return { imageId, event: withAssignedImage(event, imageId) };
  }
}
