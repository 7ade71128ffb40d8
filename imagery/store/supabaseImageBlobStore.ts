import { getSupabase } from "../../lib/supabaseClient.js";
import { blobFileName, type ImageBlobStore } from "./imageBlobStore.js";

/**
 * Image bytes kept in a private Supabase Storage bucket, for installs that
 * share one cache across machines. Metadata stays in the local file.
 */
export class SupabaseImageBlobStore implements ImageBlobStore {
  constructor(
    private readonly bucket: string,
    private readonly prefix = "event-images"
  ) {}

  private pathFor(id: string): string {
    return `${this.prefix}/${blobFileName(id)}`;
  }

  async write(id: string, bytes: Uint8Array): Promise<void> {
    const { error } = await getSupabase()
      .storage.from(this.bucket)
      .upload(this.pathFor(id), bytes, {
        contentType: "image/jpeg",
        upsert: true, // same id, same bytes
      });

    if (error) {
      throw new Error(`Failed to upload ${this.pathFor(id)}: ${error.message}`);
    }
  }

  async read(id: string): Promise<Uint8Array | null> {
    const { data, error } = await getSupabase()
      .storage.from(this.bucket)
      .download(this.pathFor(id));

    if (error || !data) {
      if (error) {
        console.warn("[image-store] blob download failed", { id, msg: error.message });
      }
      return null;
    }

    const buffer = await data.arrayBuffer();
    return buffer.byteLength === 0 ? null : new Uint8Array(buffer);
  }

  async remove(id: string): Promise<void> {
    const { error } = await getSupabase()
      .storage.from(this.bucket)
      .remove([this.pathFor(id)]);

    if (error) {
      throw new Error(`Failed to remove ${this.pathFor(id)}: ${error.message}`);
    }
  }
}
