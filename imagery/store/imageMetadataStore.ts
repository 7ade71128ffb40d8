import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { imageryLog, imageryLogHelpers } from "../../logging/imageryLog.js";
import { score, titleWords } from "../matching/similarityMatcher.js";
import { LocalImageBlobStore, type ImageBlobStore } from "./imageBlobStore.js";
import {
  ImageMetadataFileSchema,
  ImageRecordSchema,
  isImageRecordExpired,
  type ImageRecord,
} from "./imageRecord.schema.js";

export const METADATA_FILENAME = "metadata.json";

export type ImageMetadataStoreOptions = {
  cacheDir: string;
  /** Defaults to one file per image inside cacheDir. */
  blobs?: ImageBlobStore;
  now?: () => Date;
  /** Start a background purge of expired records right after loading. */
  sweepOnOpen?: boolean;
};

/**
 * Owns the id → ImageRecord map, its metadata.json mirror and the image
 * blobs. Reads are synchronous against the in-memory map; every mutation
 * is flushed to disk through a single write chain so flushes never
 * interleave.
 */
export class ImageMetadataStore {
  private readonly records = new Map<string, ImageRecord>();
  private readonly metadataPath: string;
  private readonly blobs: ImageBlobStore;
  private readonly now: () => Date;
  private writeChain: Promise<void> = Promise.resolve();

  /** Set when the store was opened with sweepOnOpen. */
  initialSweep: Promise<string[]> | null = null;

  private constructor(options: ImageMetadataStoreOptions) {
    this.metadataPath = path.join(options.cacheDir, METADATA_FILENAME);
    this.blobs = options.blobs ?? new LocalImageBlobStore(options.cacheDir);
    this.now = options.now ?? (() => new Date());
  }

  static async open(options: ImageMetadataStoreOptions): Promise<ImageMetadataStore> {
    await mkdir(options.cacheDir, { recursive: true });

    const store = new ImageMetadataStore(options);
    await store.load();

    if (options.sweepOnOpen) {
      store.initialSweep = store.startBackgroundSweep();
    }
    return store;
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  /** Returns a copy; changing it never touches the stored record. */
  get(id: string): ImageRecord | null {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  isExpired(record: ImageRecord): boolean {
    return isImageRecordExpired(record, this.now());
  }

  size(): number {
    return this.records.size;
  }

  stats(): { total: number; expired: number } {
    let expired = 0;
    for (const record of this.records.values()) {
      if (this.isExpired(record)) expired++;
    }
    return { total: this.records.size, expired };
  }

  /**
   * Non-expired records that score above zero against the query under
   * either matcher profile. With nothing to match on, every non-expired
   * record is a candidate. Unordered; ranking is the matcher's job.
   */
  findCandidates(titleQuery: string | null | undefined, locationQuery?: string | null): ImageRecord[] {
    const words = titleWords(titleQuery ?? "");
    const live = this.liveRecords();
    if (words.length === 0 && !locationQuery?.trim()) return live;

    return live.filter(
      (record) =>
        score(record, words, locationQuery, "resolution") > 0 ||
        score(record, words, locationQuery, "browsing") > 0
    );
  }

  randomRecord(random: () => number = Math.random): ImageRecord | null {
    const live = this.liveRecords();
    if (live.length === 0) return null;
    return live[Math.min(live.length - 1, Math.floor(random() * live.length))];
  }

  async readImage(id: string): Promise<Uint8Array | null> {
    if (!this.records.has(id)) return null;
    return this.blobs.read(id);
  }

  private liveRecords(): ImageRecord[] {
    return [...this.records.values()]
      .filter((r) => !this.isExpired(r))
      .map((r) => structuredClone(r));
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  /**
   * Upsert a record (and its bytes, when given) and flush metadata.
   */
  async put(record: ImageRecord, bytes?: Uint8Array): Promise<void> {
    const validated = ImageRecordSchema.parse(record);

    await this.enqueueWrite(async () => {
      if (bytes) {
        await this.blobs.write(validated.id, bytes);
      }
      this.records.set(validated.id, validated);
      await this.flush();
    });
  }

  /**
   * Remove every expired record and its blob. Returns the removed ids.
   */
  async purgeExpired(): Promise<string[]> {
    let removed: string[] = [];

    await this.enqueueWrite(async () => {
      // Decided inside the chain so a record refreshed by a queued put survives
      const expiredIds = [...this.records.values()]
        .filter((r) => this.isExpired(r))
        .map((r) => r.id);

      if (expiredIds.length === 0) return;

      for (const id of expiredIds) {
        await this.blobs.remove(id);
        this.records.delete(id);
      }
      await this.flush();
      removed = expiredIds;
    });

    imageryLogHelpers.purged({ count: removed.length, remaining: this.records.size });
    return removed;
  }

  /**
   * Purge off the caller's path. Failures are logged, never thrown.
   */
  startBackgroundSweep(): Promise<string[]> {
    return this.purgeExpired().catch((e: unknown) => {
      console.warn("[image-store] background sweep failed", {
        msg: e instanceof Error ? e.message : String(e),
      });
      return [];
    });
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const run = this.writeChain.then(task);
    // The caller observes failures through `run`; the chain itself must
    // stay usable for the next writer.
    this.writeChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.metadataPath, "utf8");
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") {
        console.log("[image-store] no metadata file found, starting empty", { path: this.metadataPath });
        return;
      }
      this.reportLoadFailure(e);
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      this.reportLoadFailure(e);
      return;
    }

    const parsed = ImageMetadataFileSchema.safeParse(json);
    if (!parsed.success) {
      this.reportLoadFailure(new Error(parsed.error.issues[0]?.message ?? "schema mismatch"));
      return;
    }

    for (const record of Object.values(parsed.data)) {
      this.records.set(record.id, record);
    }
    console.log("[image-store] loaded", { records: this.records.size });
  }

  private reportLoadFailure(e: unknown): void {
    const message = e instanceof Error ? e.message : String(e);
    console.warn("[image-store] metadata unreadable, starting empty", { path: this.metadataPath, msg: message });
    imageryLog({ event: "image.cache.load_failed", error_message: message });
  }

  private async flush(): Promise<void> {
    const snapshot = Object.fromEntries(this.records);
    const tmpPath = `${this.metadataPath}.tmp`;
    await writeFile(tmpPath, JSON.stringify(snapshot, null, 2));
    await rename(tmpPath, this.metadataPath);
  }
}
