import { z } from "zod";

export class MissingConfigError extends Error {
  constructor(public variable: string) {
    super(`Missing env var: ${variable}`);
    this.name = "MissingConfigError";
  }
}

export function requireEnv(name: string, env: NodeJS.ProcessEnv = process.env): string {
  const v = env[name];
  if (!v) throw new MissingConfigError(name);
  return v;
}

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const ConfigSchema = z.object({
  IMAGE_CACHE_DIR: z.string().min(1).default(".cache/event-images"),
  IMAGE_BLOB_BACKEND: z.enum(["local", "supabase"]).default("local"),
  SUPABASE_IMAGE_BUCKET: z.string().min(1).default("event-images"),
  REQUEST_QUEUE_CONCURRENCY: z.coerce.number().int().positive().default(1),
  REQUEST_QUEUE_MIN_INTERVAL_MS: intFromEnv(5000),
  REQUEST_QUEUE_MAX_PER_MINUTE: intFromEnv(3),
  IMAGE_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  IMAGE_SWEEP_DISABLED: z.string().optional(),
  DEFAULT_LATITUDE: z.coerce.number().min(-90).max(90).default(40.7128),
  DEFAULT_LONGITUDE: z.coerce.number().min(-180).max(180).default(-74.006),
});

export type AppConfig = {
  imageCacheDir: string;
  imageBlobBackend: "local" | "supabase";
  supabaseImageBucket: string;
  queue: {
    concurrency: number;
    minIntervalMs: number;
    /** 0 disables the per-minute cap. */
    maxPerMinute: number;
  };
  sweep: {
    intervalMs: number;
    enabled: boolean;
  };
  defaultCoordinate: {
    latitude: number;
    longitude: number;
  };
};

/**
 * Parse configuration from the environment. Empty strings count as unset so
 * a blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") present[key] = value;
  }

  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const c = parsed.data;
  return {
    imageCacheDir: c.IMAGE_CACHE_DIR,
    imageBlobBackend: c.IMAGE_BLOB_BACKEND,
    supabaseImageBucket: c.SUPABASE_IMAGE_BUCKET,
    queue: {
      concurrency: c.REQUEST_QUEUE_CONCURRENCY,
      minIntervalMs: c.REQUEST_QUEUE_MIN_INTERVAL_MS,
      maxPerMinute: c.REQUEST_QUEUE_MAX_PER_MINUTE,
    },
    sweep: {
      intervalMs: c.IMAGE_SWEEP_INTERVAL_MS,
      enabled: c.IMAGE_SWEEP_DISABLED !== "1",
    },
    defaultCoordinate: {
      latitude: c.DEFAULT_LATITUDE,
      longitude: c.DEFAULT_LONGITUDE,
    },
  };
}
