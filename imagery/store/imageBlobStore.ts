import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";

/**
 * Backing store for cached image bytes, one blob per image id.
 */
export interface ImageBlobStore {
  write(id: string, bytes: Uint8Array): Promise<void>;
  /** null when no blob exists for the id. */
  read(id: string): Promise<Uint8Array | null>;
  /** Removing a missing blob is not an error. */
  remove(id: string): Promise<void>;
}

export function blobFileName(id: string): string {
  return `${id}.jpg`;
}

export class LocalImageBlobStore implements ImageBlobStore {
  constructor(private readonly directory: string) {}

  private pathFor(id: string): string {
    return path.join(this.directory, blobFileName(id));
  }

  async write(id: string, bytes: Uint8Array): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.pathFor(id), bytes);
  }

  async read(id: string): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await readFile(this.pathFor(id)));
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  async remove(id: string): Promise<void> {
    await rm(this.pathFor(id), { force: true });
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
