import { imageryLog } from "../../logging/imageryLog.js";
import { RequestCancelledError } from "../errors.js";

export type RequestQueueOptions = {
  /** Work items running at once. */
  concurrency?: number;
  /** Minimum gap between two starts. */
  minIntervalMs?: number;
  /** Starts allowed per sliding window. */
  maxPerWindow?: number;
  windowMs?: number;
  now?: () => number;
};

export const DEFAULT_QUEUE_OPTIONS = {
  concurrency: 1,
  minIntervalMs: 5000,
  maxPerWindow: 3,
  windowMs: 60_000,
} as const;

type WaitingRequest = {
  id: string;
  start: () => void;
  cancel: (error: Error) => void;
};

/**
 * Rate-limited FIFO executor. At most one execution per id is ever in
 * flight: a second enqueue of a queued or running id gets the first
 * caller's promise instead of running `work` again. Once that promise
 * settles the id is free.
 */
export class RequestQueue<T> {
  private readonly concurrency: number;
  private readonly minIntervalMs: number;
  private readonly maxPerWindow: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  private readonly inFlight = new Map<string, Promise<T>>();
  private readonly waiting: WaitingRequest[] = [];
  private active = 0;
  private starts: number[] = [];
  private lastStart: number | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: RequestQueueOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_QUEUE_OPTIONS.concurrency);
    this.minIntervalMs = options.minIntervalMs ?? DEFAULT_QUEUE_OPTIONS.minIntervalMs;
    this.maxPerWindow = Math.max(1, options.maxPerWindow ?? DEFAULT_QUEUE_OPTIONS.maxPerWindow);
    this.windowMs = options.windowMs ?? DEFAULT_QUEUE_OPTIONS.windowMs;
    this.now = options.now ?? (() => Date.now());
  }

  enqueue(id: string, work: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(id);
    if (existing) {
      imageryLog({ event: "queue.request.coalesced", request_id: id });
      return existing;
    }

    const promise = this.run(id, work).finally(() => {
      this.inFlight.delete(id);
    });
    this.inFlight.set(id, promise);
    return promise;
  }

  /**
   * Drop a request that has not started yet. Its callers see a
   * RequestCancelledError. Running work cannot be cancelled.
   */
  cancel(id: string): boolean {
    const index = this.waiting.findIndex((r) => r.id === id);
    if (index === -1) return false;

    const [request] = this.waiting.splice(index, 1);
    request.cancel(new RequestCancelledError(id));
    console.log("[request-queue] cancelled", { id, queued: this.waiting.length });
    return true;
  }

  /** Queued plus running. */
  size(): number {
    return this.waiting.length + this.active;
  }

  status(): string {
    const now = this.now();
    const recent = this.recentStarts(now).length;
    const lastStart =
      this.lastStart === null ? "none" : `${Math.round((now - this.lastStart) / 1000)}s ago`;

    return [
      "Queue status:",
      `- Queued: ${this.waiting.length}`,
      `- In flight: ${this.active}`,
      `- Recent starts (last ${Math.round(this.windowMs / 1000)}s): ${recent}/${this.maxPerWindow}`,
      `- Last start: ${lastStart}`,
    ].join("\n");
  }

  private async run(id: string, work: () => Promise<T>): Promise<T> {
    await new Promise<void>((start, cancel) => {
      this.waiting.push({ id, start, cancel });
      this.pump();
    });

    const startedAt = this.now();
    imageryLog({ event: "queue.request.started", request_id: id, queued: this.waiting.length });

    try {
      return await work();
    } finally {
      this.active--;
      imageryLog({
        event: "queue.request.finished",
        request_id: id,
        duration_ms: this.now() - startedAt,
      });
      this.pump();
    }
  }

  private pump(): void {
    while (this.waiting.length > 0 && this.active < this.concurrency) {
      const delay = this.delayBeforeNextStart();
      if (delay > 0) {
        this.scheduleRetry(delay);
        return;
      }

      const next = this.waiting.shift();
      if (!next) return;

      const now = this.now();
      this.active++;
      this.lastStart = now;
      this.starts = [...this.recentStarts(now), now];
      next.start();
    }
  }

  private delayBeforeNextStart(): number {
    const now = this.now();
    let delay = 0;

    if (this.lastStart !== null) {
      delay = Math.max(delay, this.lastStart + this.minIntervalMs - now);
    }

    const recent = this.recentStarts(now);
    if (recent.length >= this.maxPerWindow) {
      // Wait for the oldest start to leave the window
      const oldest = recent[recent.length - this.maxPerWindow];
      delay = Math.max(delay, oldest + this.windowMs - now);
    }

    return delay;
  }

  private recentStarts(now: number): number[] {
    return this.starts.filter((t) => now - t < this.windowMs);
  }

  private scheduleRetry(delayMs: number): void {
    if (this.timer) return;

    console.log("[request-queue] rate limited, waiting", { delayMs, queued: this.waiting.length });
    this.timer = setTimeout(() => {
      this.timer = null;
      this.pump();
    }, delayMs);
  }
}
