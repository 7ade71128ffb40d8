/**
 * Structured logging for the event-image pipeline.
 *
 * One JSON object per line on stdout, each with an ISO timestamp.
 */

export type ImageryLogEvent =
  | "image.resolve.assigned_hit"
  | "image.resolve.matched"
  | "image.resolve.fetch_queued"
  | "image.fetch.succeeded"
  | "image.fetch.failed"
  | "image.search.completed"
  | "image.cache.load_failed"
  | "image.cache.purged"
  | "queue.request.coalesced"
  | "queue.request.started"
  | "queue.request.finished";

export type ImageryLogData = {
  event: ImageryLogEvent;
  image_id?: string;
  request_id?: string;
  match_kind?: "auto_accept" | "exact" | "good_enough";
  score?: number;
  query?: string;
  count?: number;
  duration_ms?: number;
  error_class?: string;
  error_message?: string;
  [key: string]: unknown;
};

export function imageryLog(data: ImageryLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

/**
 * Helpers for events emitted from more than one place.
 */
export const imageryLogHelpers = {
  matched(params: {
    image_id: string;
    match_kind: "auto_accept" | "exact" | "good_enough";
    score: number;
  }): void {
    imageryLog({
      event: "image.resolve.matched",
      image_id: params.image_id,
      match_kind: params.match_kind,
      score: Number(params.score.toFixed(2)),
    });
  },

  fetchSucceeded(params: { request_id: string; image_id: string; query: string }): void {
    imageryLog({
      event: "image.fetch.succeeded",
      request_id: params.request_id,
      image_id: params.image_id,
      query: params.query,
    });
  },

  fetchFailed(params: {
    request_id: string;
    query: string;
    error_class: string;
    error_message: string;
  }): void {
    imageryLog({
      event: "image.fetch.failed",
      request_id: params.request_id,
      query: params.query,
      error_class: params.error_class,
      error_message: params.error_message,
    });
  },

  purged(params: { count: number; remaining: number }): void {
    imageryLog({
      event: "image.cache.purged",
      count: params.count,
      remaining: params.remaining,
    });
  },
};
