import { FeedUnavailableError } from "../../lib/errors";
import type {
  DropTableDocument,
  Item,
  ItemCatalog,
  RawRelicRecord,
  Relic,
  RelicCatalogSnapshot,
  RelicMap,
  RewardEntry,
} from "./types";

export const relicDisplayName = (tier: string, baseName: string, state: string): string =>
  `${tier} ${baseName} ${state}`;

/**
 * Market slug of a relic. The state is left out on purpose: the market lists
 * every refinement of a relic under the same page.
 */
export const relicSlug = (tier: string, baseName: string): string =>
  `${tier}_${baseName}_relic`.toLowerCase().replace(/ /g, "_");

export const itemSlug = (itemName: string): string =>
  itemName.replace(/ /g, "_").toLowerCase().replace(/&/g, "and");

const isText = (value: unknown): value is string => typeof value === "string" && value.length > 0;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStoredReward = (value: unknown): value is RewardEntry =>
  isPlainObject(value) &&
  typeof value.itemName === "string" &&
  typeof value.rarity === "string" &&
  typeof value.chance === "number";

const isStoredRelic = (value: unknown): value is Relic =>
  isPlainObject(value) &&
  typeof value.relicName === "string" &&
  typeof value.tier === "string" &&
  typeof value.baseName === "string" &&
  typeof value.state === "string" &&
  typeof value.urlName === "string" &&
  typeof value.value === "number" &&
  (value.price === null || typeof value.price === "number") &&
  Array.isArray(value.rewards) &&
  value.rewards.every(isStoredReward);

/** Shape check for a persisted relic catalog. */
export const isRelicCatalogSnapshot = (value: unknown): value is RelicCatalogSnapshot =>
  isPlainObject(value) &&
  typeof value.timestamp === "number" &&
  isPlainObject(value.relics) &&
  Object.values(value.relics).every(isStoredRelic);

const isStoredItem = (value: unknown): value is Item =>
  isPlainObject(value) &&
  typeof value.itemName === "string" &&
  typeof value.urlName === "string";

/** Shape check for a persisted item catalog. */
export const isItemCatalog = (value: unknown): value is ItemCatalog =>
  isPlainObject(value) && Object.values(value).every(isStoredItem);

const toReward = (value: unknown): RewardEntry | null => {
  if (!value || typeof value !== "object") return null;
  const { itemName, rarity, chance } = value as Partial<Record<keyof RewardEntry, unknown>>;
  if (!isText(itemName)) return null;
  const parsedChance = Number(chance);
  return {
    itemName,
    rarity: typeof rarity === "string" ? rarity : "",
    chance: Number.isFinite(parsedChance) ? parsedChance : 0,
  };
};

const toRelicRecord = (value: unknown): RawRelicRecord | null => {
  if (!value || typeof value !== "object") return null;
  const { tier, relicName, state, rewards } = value as Partial<
    Record<keyof RawRelicRecord, unknown>
  >;
  if (!isText(tier) || !isText(relicName) || !isText(state) || !Array.isArray(rewards)) {
    return null;
  }
  return {
    tier,
    relicName,
    state,
    rewards: rewards
      .map(toReward)
      .filter((reward): reward is RewardEntry => reward !== null),
  };
};

/**
 * Validates the drop-table document. Broken records are skipped; a document
 * without a relic list cannot be used at all.
 */
export const parseDropTable = (document: unknown): DropTableDocument => {
  const list =
    document && typeof document === "object" && "relics" in document
      ? document.relics
      : undefined;
  if (!Array.isArray(list)) {
    throw new FeedUnavailableError("Drop-table feed has no relic list");
  }

  const relics: RawRelicRecord[] = [];
  let skipped = 0;
  for (const entry of list) {
    const record = toRelicRecord(entry);
    if (record) relics.push(record);
    else skipped += 1;
  }
  if (skipped) {
    console.warn("parseDropTable: skipped malformed relic records", { skipped });
  }
  return { relics };
};

export const buildRelicCatalog = (
  records: RawRelicRecord[],
  timestamp: number,
): RelicCatalogSnapshot => {
  const relics: RelicMap = {};
  for (const record of records) {
    const name = relicDisplayName(record.tier, record.relicName, record.state);
    relics[name] = {
      relicName: name,
      tier: record.tier,
      baseName: record.relicName,
      state: record.state,
      urlName: relicSlug(record.tier, record.relicName),
      rewards: record.rewards.map((reward) => ({ ...reward })),
      value: 0,
      price: null,
    };
  }
  return { timestamp, relics };
};

/** Distinct reward items; the first occurrence of a name decides its rarity and chance. */
export const deriveItemCatalog = (relics: RelicMap): ItemCatalog => {
  const items: ItemCatalog = {};
  for (const relic of Object.values(relics)) {
    for (const reward of relic.rewards) {
      if (Object.hasOwn(items, reward.itemName)) continue;
      items[reward.itemName] = {
        itemName: reward.itemName,
        rarity: reward.rarity,
        chance: reward.chance,
        urlName: itemSlug(reward.itemName),
      };
    }
  }
  return items;
};
