export * from "./astro/errors.js";
export * from "./astro/calendar/calendarDate.js";
export * from "./astro/schemas/geoCoordinate.schema.js";
export * from "./astro/solar/solarCalculator.js";
export * from "./astro/daylight/daylightColors.js";
export * from "./astro/daylight/daylightColorModel.js";
export * from "./astro/daylight/astronomicalSummary.js";
export * from "./astro/lunar/lunarPhase.js";

export * from "./imagery/errors.js";
export * from "./imagery/store/imageRecord.schema.js";
export * from "./imagery/store/imageBlobStore.js";
export { SupabaseImageBlobStore } from "./imagery/store/supabaseImageBlobStore.js";
export * from "./imagery/store/imageMetadataStore.js";
export {
  AUTO_ACCEPT_THRESHOLD,
  GOOD_ENOUGH_THRESHOLD,
  locationsOverlap,
  rankBySimilarity,
  score as similarityScore,
  titleWords,
  type RankedRecord,
  type SimilarityProfile,
} from "./imagery/matching/similarityMatcher.js";
export { buildSearchQuery } from "./imagery/matching/buildSearchQuery.js";
export * from "./imagery/queue/requestQueue.js";
export type { ImageProvider, ProviderPhoto, SearchOptions } from "./imagery/provider/imageProvider.js";
export { UnsplashClient, UNSPLASH_BASE_URL } from "./imagery/provider/unsplashClient.js";
export { classifyError, decideRetry, withRetry } from "./imagery/provider/retryPolicy.js";
export * from "./imagery/resolver/calendarEventRef.js";
export * from "./imagery/resolver/imageResolver.js";
export { runExpirySweepOnce, scheduleExpirySweep } from "./imagery/worker/runExpirySweepOnce.js";
export { createImagery, type Imagery } from "./imagery/createImagery.js";

export { loadConfig, requireEnv, MissingConfigError, type AppConfig } from "./lib/config.js";
export { imageryLog, type ImageryLogEvent } from "./logging/imageryLog.js";
