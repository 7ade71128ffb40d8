/**
 * Stock-photo source used by the resolver. Implementations normalize
 * their wire format into ProviderPhoto and throw on failure.
 */

export type ProviderPhoto = {
  sourceId: string;
  fullUrl: string;
  thumbnailUrl: string;
  author: string;
  authorUrl?: string;
  downloadTrackingUrl: string;
  tags: string[];
};

export type SearchOptions = {
  page?: number;
  perPage?: number;
};

export interface ImageProvider {
  fetchRandomPhoto(query: string): Promise<ProviderPhoto>;
  searchPhotos(query: string, options?: SearchOptions): Promise<ProviderPhoto[]>;
  downloadBytes(url: string): Promise<Uint8Array>;
  /** Report a download back to the provider, as its terms require. */
  trackDownload(photo: Pick<ProviderPhoto, "sourceId" | "downloadTrackingUrl">): Promise<void>;
}
