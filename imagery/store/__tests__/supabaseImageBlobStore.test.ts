import { beforeEach, describe, expect, it, vi } from "vitest";
import { SupabaseImageBlobStore } from "../supabaseImageBlobStore.js";

const { upload, download, remove, from } = vi.hoisted(() => {
  const upload = vi.fn();
  const download = vi.fn();
  const remove = vi.fn();
  const from = vi.fn(() => ({ upload, download, remove }));
  return { upload, download, remove, from };
});

vi.mock("../../../lib/supabaseClient.js", () => ({
  getSupabase: () => ({ storage: { from } }),
}));

describe("SupabaseImageBlobStore", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("uploads under the prefix with upsert", async () => {
    upload.mockResolvedValue({ data: { path: "event-images/a.jpg" }, error: null });

    const store = new SupabaseImageBlobStore("bucket");
    const bytes = new Uint8Array([9, 8, 7]);
    await store.write("a", bytes);

    expect(from).toHaveBeenCalledWith("bucket");
    expect(upload).toHaveBeenCalledWith("event-images/a.jpg", bytes, {
      contentType: "image/jpeg",
      upsert: true,
    });
  });

  it("throws when the upload fails", async () => {
    upload.mockResolvedValue({ data: null, error: { message: "quota exceeded" } });

    const store = new SupabaseImageBlobStore("bucket", "cache");
    await expect(store.write("a", new Uint8Array([1]))).rejects.toThrow(
      "Failed to upload cache/a.jpg: quota exceeded"
    );
  });

  it("returns downloaded bytes", async () => {
    download.mockResolvedValue({ data: new Blob([new Uint8Array([5, 6])]), error: null });

    const store = new SupabaseImageBlobStore("bucket");
    expect(await store.read("a")).toEqual(new Uint8Array([5, 6]));
  });

  it("returns null when the object is missing", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    download.mockResolvedValue({ data: null, error: { message: "Object not found" } });

    const store = new SupabaseImageBlobStore("bucket");
    expect(await store.read("a")).toBeNull();
    expect(warn).toHaveBeenCalledWith("[image-store] blob download failed", {
      id: "a",
      msg: "Object not found",
    });
    warn.mockRestore();
  });

  it("removes the object path", async () => {
    remove.mockResolvedValue({ data: [], error: null });

    const store = new SupabaseImageBlobStore("bucket");
    await store.remove("a");

    expect(remove).toHaveBeenCalledWith(["event-images/a.jpg"]);
  });
});
