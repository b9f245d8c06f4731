import { z } from "zod";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalText = z
  .string()
  .optional()
  .transform((v) => {
    const t = v?.trim();
    return t ? t : undefined;
  });

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  CORS_ORIGIN: optionalText,
  NEWSAPI_KEY: z.string().trim().min(1, "NEWSAPI_KEY is required"),
  NEWSAPI_BASE_URL: z.string().trim().url().default("https://newsapi.org/v2"),
  NEWSAPI_TIMEOUT_MS: positiveInt(10_000),
  SEARCH_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(10),
  POLL_INTERVAL_MS: positiveInt(30_000),
  RATE_LIMIT_BACKOFF_FACTOR: positiveInt(4),
  HISTORY_CAPACITY: positiveInt(10),
  SEEN_CAPACITY: positiveInt(100),
  ANALYSIS_TIMEOUT_MS: positiveInt(10_000),
  WORKER_MAX_RESTARTS: z.coerce.number().int().min(0).default(3),
  WORKER_RESTART_WINDOW_MS: positiveInt(60_000),
  SOURCES_CACHE_TTL_MS: positiveInt(3_600_000),
  SOURCES_COUNTRY: optionalText,
  SOURCES_CATEGORY: optionalText,
  SOURCES_LANGUAGE: optionalText,
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface RelayConfig {
  port: number;
  corsOrigin: string | undefined;
  logLevel: "debug" | "info" | "warn" | "error";
  newsApi: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    pageSize: number;
  };
  session: {
    pollIntervalMs: number;
    rateLimitBackoffFactor: number;
    historyCapacity: number;
    seenCapacity: number;
    sourceFilter: { country?: string; category?: string; language?: string };
  };
  workers: {
    analysisTimeoutMs: number;
    maxRestarts: number;
    restartWindowMs: number;
  };
  sourcesCacheTtlMs: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    logLevel: e.LOG_LEVEL,
    newsApi: {
      apiKey: e.NEWSAPI_KEY,
      baseUrl: e.NEWSAPI_BASE_URL.replace(/\/+$/, ""),
      timeoutMs: e.NEWSAPI_TIMEOUT_MS,
      pageSize: e.SEARCH_PAGE_SIZE,
    },
    session: {
      pollIntervalMs: e.POLL_INTERVAL_MS,
      rateLimitBackoffFactor: e.RATE_LIMIT_BACKOFF_FACTOR,
      historyCapacity: e.HISTORY_CAPACITY,
      seenCapacity: e.SEEN_CAPACITY,
      sourceFilter: {
        country: e.SOURCES_COUNTRY,
        category: e.SOURCES_CATEGORY,
        language: e.SOURCES_LANGUAGE,
      },
    },
    workers: {
      analysisTimeoutMs: e.ANALYSIS_TIMEOUT_MS,
      maxRestarts: e.WORKER_MAX_RESTARTS,
      restartWindowMs: e.WORKER_RESTART_WINDOW_MS,
    },
    sourcesCacheTtlMs: e.SOURCES_CACHE_TTL_MS,
  };
}
