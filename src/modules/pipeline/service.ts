/**
 * One refresh cycle: catalog → market fetch → valuation → rankings.
 * Each stage writes its snapshot once; the fetch stage is skipped when its dump is already on disk.
 */
import type { AppConfig } from "../../config";
import { SNAPSHOTS, type SnapshotStore } from "../../database/snapshots";
import { AdmissionGate } from "../../lib/admission";
import type { DropTableSource } from "../drops/repo";
import { collectFetchTargets, ensureMarketDump, toPayloadMap } from "../market/fetcher";
import type { MarketTransport } from "../market/repo";
import type { FetchProgress, MarketEndpoint } from "../market/types";
import { ensureCatalog } from "../relics/service";
import type { RelicCatalogSnapshot, RelicMap } from "../relics/types";
import { estimatePrices } from "../valuation/pricing";
import { computeRelicValues, rankRelics } from "../valuation/service";
import type { PriceIndex, PriceMode, Rankings } from "../valuation/types";

export type PipelineConfig = Pick<
  AppConfig,
  | "fetchConcurrency"
  | "maxThrottleRetries"
  | "throttleBackoffMs"
  | "throttleMaxBackoffMs"
  | "relicMaxAgeSeconds"
  | "priceMode"
  | "statisticsWindow"
  | "statisticsSampleSize"
  | "statisticsPolicy"
>;

export interface PipelineDeps {
  store: SnapshotStore;
  feed: DropTableSource;
  transport: MarketTransport;
  config: PipelineConfig;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export type PipelineStage = "catalog" | MarketEndpoint | "valuation" | "done";

export interface PipelineOptions {
  mode?: PriceMode;
  concurrency?: number;
  /** Rebuild the catalog (and so every derived snapshot) regardless of its age. */
  force?: boolean;
  /** Fetch both endpoints, not only the one the mode prices from. */
  fetchAll?: boolean;
  onProgress?: (stage: PipelineStage, progress?: FetchProgress) => void;
}

export interface PipelineResult {
  mode: PriceMode;
  relics: RelicMap;
  prices: PriceIndex;
  rankings: Rankings;
  fetched: { total: number; failed: number };
}

export const endpointFor = (mode: PriceMode): MarketEndpoint =>
  mode === "live" ? "orders" : "statistics";

export const runPipeline = async (
  deps: PipelineDeps,
  options: PipelineOptions = {},
): Promise<PipelineResult> => {
  const { store, config } = deps;
  const mode = options.mode ?? config.priceMode;
  const report = options.onProgress ?? (() => undefined);

  report("catalog");
  const catalog = await ensureCatalog(store, deps.feed, {
    force: options.force,
    maxAgeSeconds: config.relicMaxAgeSeconds,
    now: deps.now,
  });

  const targets = collectFetchTargets(catalog.relics.relics, catalog.items);
  const gate = new AdmissionGate(options.concurrency ?? config.fetchConcurrency);
  const pricedFrom = endpointFor(mode);
  const endpoints: MarketEndpoint[] = options.fetchAll ? ["statistics", "orders"] : [pricedFrom];

  let priced: unknown[] = [];
  const fetched = { total: targets.length, failed: 0 };
  for (const endpoint of endpoints) {
    report(endpoint);
    const result = await ensureMarketDump(store, targets, {
      endpoint,
      transport: deps.transport,
      gate,
      maxRetries: config.maxThrottleRetries,
      backoffMs: config.throttleBackoffMs,
      maxBackoffMs: config.throttleMaxBackoffMs,
      sleep: deps.sleep,
      onProgress: (progress) => report(endpoint, progress),
    });
    if (endpoint === pricedFrom) {
      priced = result.dump;
      fetched.failed = result.failed;
    }
  }

  report("valuation");
  const prices = estimatePrices(toPayloadMap(priced.filter(isEntry)), mode, {
    window: config.statisticsWindow,
    sampleSize: config.statisticsSampleSize,
    policy: config.statisticsPolicy,
  });
  const relics = computeRelicValues(catalog.relics.relics, prices);
  const rankings = rankRelics(relics, prices);

  const valued: RelicCatalogSnapshot = { timestamp: catalog.relics.timestamp, relics };
  await store.save(SNAPSHOTS.relics, valued);
  await store.save(SNAPSHOTS.valueRanking, rankings.value);
  await store.save(SNAPSHOTS.profitRanking, rankings.profit);
  report("done");

  return { mode, relics, prices, rankings, fetched };
};

const isEntry = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const header = (title: string) => [title, "------------------------"];

/** Plain-text top-N report of both rankings. */
export const formatReport = (rankings: Rankings, top = 25): string =>
  [
    ...header(`Top ${top} Relics by value: `),
    ...rankings.value.slice(0, top).map((e) => `${e.relicName}: ${e.metric.toFixed(2)}p`),
    "",
    ...header(`Top ${top} Relics by profit (EV/Price): `),
    ...rankings.profit.slice(0, top).map((e) => `${e.relicName}: ${e.metric.toFixed(2)}`),
  ].join("\n");
