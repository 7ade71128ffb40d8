import type { AppConfig } from "../lib/config.js";
import type { ImageProvider } from "./provider/imageProvider.js";
import { UnsplashClient } from "./provider/unsplashClient.js";
import { RequestQueue } from "./queue/requestQueue.js";
import { ImageResolver } from "./resolver/imageResolver.js";
import { ImageMetadataStore } from "./store/imageMetadataStore.js";
import type { ImageRecord } from "./store/imageRecord.schema.js";
import { SupabaseImageBlobStore } from "./store/supabaseImageBlobStore.js";
import { scheduleExpirySweep } from "./worker/runExpirySweepOnce.js";

export type Imagery = {
  store: ImageMetadataStore;
  queue: RequestQueue<ImageRecord[]>;
  provider: ImageProvider;
  resolver: ImageResolver;
  /** Stops the periodic expiry sweep. A no-op when the sweep is disabled. */
  stopSweep: () => void;
};

const ONE_MINUTE_MS = 60_000;

/**
 * Wire the image pipeline from configuration. The store is opened before
 * returning and, unless the sweep is disabled, swept once in the
 * background and then every `config.sweep.intervalMs` by this process,
 * which stays the metadata file's only writer.
 */
export async function createImagery(
  config: AppConfig,
  overrides: { provider?: ImageProvider; sweepOnOpen?: boolean } = {}
): Promise<Imagery> {
  const blobs =
    config.imageBlobBackend === "supabase"
      ? new SupabaseImageBlobStore(config.supabaseImageBucket)
      : undefined;

  const store = await ImageMetadataStore.open({
    cacheDir: config.imageCacheDir,
    blobs,
    sweepOnOpen: overrides.sweepOnOpen ?? config.sweep.enabled,
  });

  const queue = new RequestQueue<ImageRecord[]>({
    concurrency: config.queue.concurrency,
    minIntervalMs: config.queue.minIntervalMs,
    maxPerWindow: config.queue.maxPerMinute === 0 ? Infinity : config.queue.maxPerMinute,
    windowMs: ONE_MINUTE_MS,
  });

  const provider = overrides.provider ?? new UnsplashClient();
  const resolver = new ImageResolver({ store, provider, queue });

  const stopSweep = config.sweep.enabled
    ? scheduleExpirySweep(store, config.sweep.intervalMs)
    : () => undefined;

  return { store, queue, provider, resolver, stopSweep };
}
