import type { MarketOrder, StatisticsRecord } from "../market/types";
import {
  NO_PRICE,
  type PriceIndex,
  type PriceMode,
  type StatisticsOptions,
} from "./types";

export const DEFAULT_STATISTICS: StatisticsOptions = {
  window: "90days",
  sampleSize: 7,
  policy: "oldest",
};

/**
 * Rounds to cents. Exact binary halves (x.125, x.375, x.625, x.875) go to the
 * even cent, everything else to the nearest one.
 */
export const round2 = (value: number) => {
  const eighths = value * 8;
  if (Number.isInteger(eighths) && Math.abs(eighths) % 2 === 1) {
    const cents = Math.floor(value * 100);
    return (cents % 2 === 0 ? cents : cents + 1) / 100;
  }
  return Math.round(value * 100) / 100;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isSellOrder = (value: unknown): value is Pick<MarketOrder, "order_type" | "platinum"> =>
  isRecord(value) && value.order_type === "sell" && typeof value.platinum === "number";

const isStatisticsRecord = (
  value: unknown,
): value is Pick<StatisticsRecord, "datetime" | "median"> =>
  isRecord(value) && typeof value.datetime === "string" && typeof value.median === "number";

/**
 * Median of the sell prices. For an even count this is the upper of the two
 * middle values, not their mean.
 */
export const liveOrderMedian = (orders: unknown): number => {
  if (!Array.isArray(orders)) return NO_PRICE;
  const prices = orders
    .filter(isSellOrder)
    .map((order) => order.platinum)
    .sort((a, b) => a - b);
  if (!prices.length) return NO_PRICE;
  return prices[Math.floor(prices.length / 2)];
};

/**
 * Mean of the daily medians of `sampleSize` records from a closed-statistics window,
 * rounded to 2 decimals. "oldest" takes the start of the chronologically sorted window.
 */
export const statisticsAverage = (
  payload: unknown,
  options: StatisticsOptions = DEFAULT_STATISTICS,
): number => {
  const closed = isRecord(payload) ? payload.statistics_closed : undefined;
  const window = isRecord(closed) ? closed[options.window] : undefined;
  if (!Array.isArray(window)) return NO_PRICE;

  const sorted = window
    .filter(isStatisticsRecord)
    .sort((a, b) => (a.datetime < b.datetime ? -1 : a.datetime > b.datetime ? 1 : 0));
  const sample =
    options.policy === "recent"
      ? sorted.slice(Math.max(0, sorted.length - options.sampleSize))
      : sorted.slice(0, options.sampleSize);
  if (!sample.length) return NO_PRICE;

  const total = sample.reduce((sum, record) => sum + record.median, 0);
  return round2(total / sample.length);
};

const ordersOf = (payload: unknown) => (isRecord(payload) ? payload.orders : undefined);

/** One price per fetched entity. */
export const estimatePrices = (
  payloads: Record<string, unknown>,
  mode: PriceMode,
  statistics: StatisticsOptions = DEFAULT_STATISTICS,
): PriceIndex => {
  const prices: PriceIndex = {};
  for (const [name, payload] of Object.entries(payloads)) {
    prices[name] =
      mode === "live" ? liveOrderMedian(ordersOf(payload)) : statisticsAverage(payload, statistics);
  }
  return prices;
};

export const hasPrice = (price: number | undefined): price is number =>
  typeof price === "number" && Number.isFinite(price);
