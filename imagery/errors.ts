export class RequestCancelledError extends Error {
  constructor(public requestId: string) {
    super(`Request ${requestId} was cancelled before it started`);
    this.name = "RequestCancelledError";
  }
}

export class ImageProviderError extends Error {
  constructor(
    message: string,
    public status: number | null = null
  ) {
    super(message);
    this.name = "ImageProviderError";
  }
}

export class UnknownImageError extends Error {
  constructor(public imageId: string) {
    super(`No cached image with id ${imageId}`);
    this.name = "UnknownImageError";
  }
}
