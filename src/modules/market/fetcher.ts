import type { AdmissionGate } from "../../lib/admission";
import { EntityFetchError, describeError } from "../../lib/errors";
import { RateLimitError, statusOf } from "../../lib/http";
import { SNAPSHOTS, type SnapshotStore } from "../../database/snapshots";
import { INTACT, type ItemCatalog, type RelicMap } from "../relics/types";
import type { MarketTransport } from "./repo";
import type { FetchProgress, FetchTarget, MarketDump, MarketEndpoint } from "./types";

export interface FetchOptions {
  endpoint: MarketEndpoint;
  transport: MarketTransport;
  gate: AdmissionGate;
  /** Retries after a 429 before the entity is given up. */
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs: number;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: (progress: FetchProgress) => void;
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/** Every Intact relic (the only tradable state) and every reward item. */
export const collectFetchTargets = (relics: RelicMap, items: ItemCatalog): FetchTarget[] => {
  const targets: FetchTarget[] = [];
  for (const [name, relic] of Object.entries(relics)) {
    if (relic.state === INTACT) targets.push({ name, slug: relic.urlName });
  }
  for (const [name, item] of Object.entries(items)) {
    targets.push({ name, slug: item.urlName });
  }
  return targets;
};

export const throttleDelay = (
  attempt: number,
  options: Pick<FetchOptions, "backoffMs" | "maxBackoffMs">,
  retryAfterMs?: number,
): number => {
  const exponential = options.backoffMs * Math.pow(2, attempt);
  return Math.min(options.maxBackoffMs, Math.max(exponential, retryAfterMs ?? 0));
};

/**
 * Fetches one entity, holding its gate slot through the backoff.
 * Resolves to the payload, or throws EntityFetchError.
 */
const fetchEntity = async (target: FetchTarget, options: FetchOptions): Promise<unknown> => {
  const wait = options.sleep ?? sleep;
  for (let attempt = 0; ; attempt++) {
    try {
      return await options.transport.getPayload(target.slug, options.endpoint);
    } catch (error) {
      if (!(error instanceof RateLimitError)) {
        throw new EntityFetchError(target.name, describeError(error), statusOf(error), error);
      }
      if (attempt >= options.maxRetries) {
        throw new EntityFetchError(
          target.name,
          `Still rate limited after ${attempt} retries`,
          429,
          error,
        );
      }
      await wait(throttleDelay(attempt, options, error.retryAfterMs));
    }
  }
};

/**
 * Fetches every target through the admission gate. The dump lists entities in
 * completion order; failed entities are logged and left out. Resolves once every
 * request has settled.
 */
export const fetchMarketData = async (
  targets: FetchTarget[],
  options: FetchOptions,
): Promise<MarketDump> => {
  const dump: MarketDump = [];
  const progress: FetchProgress = { done: 0, total: targets.length, failed: 0 };

  await Promise.all(
    targets.map((target) =>
      options.gate.run(async () => {
        try {
          const payload = await fetchEntity(target, options);
          dump.push({ [target.name]: payload });
        } catch (error) {
          if (!(error instanceof EntityFetchError)) throw error;
          progress.failed += 1;
          console.warn(`Error on ${target.name}`, {
            endpoint: options.endpoint,
            slug: target.slug,
            status: error.status,
            error: error.message,
          });
        } finally {
          progress.done += 1;
          options.onProgress?.({ ...progress });
        }
      }),
    ),
  );

  return dump;
};

/** Union of the single-entry dump records, keyed by entity name. */
const isMarketDump = (value: unknown): value is MarketDump =>
  Array.isArray(value) &&
  value.every((entry) => typeof entry === "object" && entry !== null && !Array.isArray(entry));

export const toPayloadMap = (dump: MarketDump): Record<string, unknown> => {
  const payloads: Record<string, unknown> = {};
  for (const entry of dump) Object.assign(payloads, entry);
  return payloads;
};

const snapshotOf = (endpoint: MarketEndpoint) =>
  endpoint === "orders" ? SNAPSHOTS.orders : SNAPSHOTS.statistics;

export interface MarketDumpResult {
  dump: MarketDump;
  fetched: boolean;
  failed: number;
}

/**
 * Returns the persisted dump of an endpoint, fetching and saving it when absent or empty.
 */
export const ensureMarketDump = async (
  store: SnapshotStore,
  targets: FetchTarget[],
  options: FetchOptions,
): Promise<MarketDumpResult> => {
  const name = snapshotOf(options.endpoint);
  const cached = await store.tryLoadChecked(name, isMarketDump);
  if (cached?.length) {
    return { dump: cached, fetched: false, failed: 0 };
  }

  let failed = 0;
  const dump = await fetchMarketData(targets, {
    ...options,
    onProgress: (progress) => {
      failed = progress.failed;
      options.onProgress?.(progress);
    },
  });
  await store.save(name, dump);
  console.log(
    `Fetched ${options.endpoint}: ${dump.length}/${targets.length} entities (${failed} failed)`,
  );
  return { dump, fetched: true, failed };
};
