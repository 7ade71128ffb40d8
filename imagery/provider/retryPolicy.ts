import { ImageProviderError } from "../errors.js";

export type RetryDecision = { shouldRetry: boolean; backoffMs: number };

export type ProviderErrorClass =
  | "provider_rate_limited"
  | "provider_timeout"
  | "provider_network"
  | "provider_server"
  | "provider_rejected"
  | "provider_error";

const RETRYABLE = new Set<ProviderErrorClass>([
  "provider_rate_limited",
  "provider_timeout",
  "provider_network",
  "provider_server",
]);

export const MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFFS_MS = [1_000, 4_000];

export function classifyError(e: unknown): { errorClass: ProviderErrorClass; message: string } {
  const message = e instanceof Error ? e.message : String(e);
  const lower = message.toLowerCase();

  if (e instanceof ImageProviderError && e.status !== null) {
    if (e.status === 429) return { errorClass: "provider_rate_limited", message };
    if (e.status >= 500) return { errorClass: "provider_server", message };
    if (e.status >= 400) return { errorClass: "provider_rejected", message };
  }

  if (lower.includes("rate limit")) return { errorClass: "provider_rate_limited", message };
  if (lower.includes("timeout") || lower.includes("etimedout") || (e instanceof Error && e.name === "TimeoutError")) {
    return { errorClass: "provider_timeout", message };
  }
  if (lower.includes("fetch failed") || lower.includes("network") || lower.includes("econnreset") || lower.includes("enotfound")) {
    return { errorClass: "provider_network", message };
  }

  return { errorClass: "provider_error", message };
}

/**
 * @param attempt - 1-based number of the attempt that just failed
 */
export function decideRetry(
  params: { attempt: number; errorClass: ProviderErrorClass },
  backoffs: number[] = DEFAULT_BACKOFFS_MS
): RetryDecision {
  if (params.attempt >= MAX_ATTEMPTS) return { shouldRetry: false, backoffMs: 0 };
  if (!RETRYABLE.has(params.errorClass)) return { shouldRetry: false, backoffMs: 0 };

  const backoffMs = backoffs.length
    ? backoffs[Math.min(params.attempt - 1, backoffs.length - 1)]
    : 0;
  return { shouldRetry: true, backoffMs };
}

export async function sleep(ms: number) {
  await new Promise((r) => setTimeout(r, ms));
}

/**
 * Run `operation` until it succeeds, a terminal error occurs, or
 * MAX_ATTEMPTS is reached. The last error is rethrown.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: { backoffs?: number[]; onRetry?: (info: { attempt: number; errorClass: ProviderErrorClass; backoffMs: number }) => void } = {}
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (e) {
      const { errorClass } = classifyError(e);
      const decision = decideRetry({ attempt, errorClass }, options.backoffs);
      if (!decision.shouldRetry) throw e;

      options.onRetry?.({ attempt, errorClass, backoffMs: decision.backoffMs });
      await sleep(decision.backoffMs);
    }
  }
}
