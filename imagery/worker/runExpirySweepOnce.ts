import type { ImageMetadataStore } from "../store/imageMetadataStore.js";

export type SweepableStore = Pick<ImageMetadataStore, "stats" | "purgeExpired" | "size">;

export type SweepResult = {
  removed: number;
  remaining: number;
};

export async function runExpirySweepOnce(store: SweepableStore): Promise<SweepResult> {
  const before = store.stats();
  if (before.expired === 0) {
    return { removed: 0, remaining: before.total };
  }

  const removed = await store.purgeExpired();
  console.log("[image-sweep] purged", { removed: removed.length, remaining: store.size() });
  return { removed: removed.length, remaining: store.size() };
}

/**
 * In-process periodic sweep for hosts that keep the store open. The timer
 * does not keep the process alive. Returns a stop function.
 */
export function scheduleExpirySweep(store: SweepableStore, intervalMs: number): () => void {
  const timer = setInterval(() => {
    runExpirySweepOnce(store).catch((e: unknown) => {
      console.error("[image-sweep] tick failed", { msg: e instanceof Error ? e.message : String(e) });
    });
  }, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
