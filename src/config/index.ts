/**
 * Run parameters of the pipeline, the API and the refresh worker.
 * Every value can be overridden through environment variables (.env is loaded by the entry points).
 */
import type { PriceMode, StatisticsPolicy } from "../modules/valuation/types";

export interface AppConfig {
  marketApiUrl: string;
  dropsApiUrl: string;
  dataDir: string;
  fetchConcurrency: number;
  throttleBackoffMs: number;
  throttleMaxBackoffMs: number;
  maxThrottleRetries: number;
  requestTimeoutMs: number;
  relicMaxAgeSeconds: number;
  priceMode: PriceMode;
  statisticsWindow: string;
  statisticsSampleSize: number;
  statisticsPolicy: StatisticsPolicy;
  port: number;
  redisUrl: string;
  refreshQueue: string;
}

type Env = Record<string, string | undefined>;

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value));

const readNumber = (raw: string | undefined, fallback: number) => {
  const parsed = Number(raw);
  return raw && Number.isFinite(parsed) ? parsed : fallback;
};

const trimSlash = (url: string) => url.replace(/\/+$/, "");

export const parsePriceMode = (value: unknown, fallback: PriceMode = "statistics"): PriceMode => {
  const text = String(value ?? "").trim().toLowerCase();
  if (text === "live" || text === "orders") return "live";
  if (text === "statistics" || text === "stats") return "statistics";
  return fallback;
};

const parsePolicy = (value: unknown): StatisticsPolicy =>
  String(value ?? "").trim().toLowerCase() === "recent" ? "recent" : "oldest";

export const loadConfig = (env: Env = process.env): AppConfig => {
  const throttleBackoffMs = clamp(readNumber(env.THROTTLE_BACKOFF_MS, 1000), 0, 60_000);
  return {
    marketApiUrl: trimSlash(env.MARKET_API_URL || "https://api.warframe.market/v1"),
    dropsApiUrl: trimSlash(env.DROPS_API_URL || "https://drops.warframestat.us/data"),
    dataDir: env.DATA_DIR || "data",
    fetchConcurrency: clamp(Math.floor(readNumber(env.FETCH_CONCURRENCY, 10)), 1, 50),
    throttleBackoffMs,
    throttleMaxBackoffMs: Math.max(
      throttleBackoffMs,
      readNumber(env.THROTTLE_MAX_BACKOFF_MS, 30_000),
    ),
    maxThrottleRetries: clamp(Math.floor(readNumber(env.MAX_THROTTLE_RETRIES, 8)), 0, 100),
    requestTimeoutMs: Math.max(1000, readNumber(env.REQUEST_TIMEOUT_MS, 20_000)),
    relicMaxAgeSeconds: Math.max(60, readNumber(env.RELIC_MAX_AGE_SECONDS, 24 * 60 * 60)),
    priceMode: parsePriceMode(env.PRICE_MODE),
    statisticsWindow: env.STATISTICS_WINDOW || "90days",
    statisticsSampleSize: clamp(Math.floor(readNumber(env.STATISTICS_SAMPLE_SIZE, 7)), 1, 90),
    statisticsPolicy: parsePolicy(env.STATISTICS_POLICY),
    port: readNumber(env.PORT, 5174),
    redisUrl: env.REDIS_URL || "redis://localhost:6379",
    refreshQueue: env.REFRESH_QUEUE || "relic-refresh",
  };
};
