import { z } from "zod";

/**
 * Cached stock-photo record. `cachedAt` is persisted as an ISO-8601 string
 * and decoded back into a Date.
 */

export const IMAGE_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export const ImageRecordSchema = z.object({
  id: z.string().min(1),
  sourceId: z.string().optional(),
  fullUrl: z.string().url(),
  thumbnailUrl: z.string().url(),
  author: z.string(),
  authorUrl: z.string().url().optional(),
  downloadTrackingUrl: z.string(),
  cachedAt: z.coerce.date(),
  tags: z.array(z.string()),
  locationQuery: z.string().optional(),
  titleQuery: z.string().optional(),
});

export type ImageRecord = z.infer<typeof ImageRecordSchema>;

/** Persisted form: id → record. */
export const ImageMetadataFileSchema = z.record(z.string(), ImageRecordSchema);

export function isImageRecordExpired(record: ImageRecord, now: Date = new Date()): boolean {
  return now.getTime() > record.cachedAt.getTime() + IMAGE_TTL_MS;
}
