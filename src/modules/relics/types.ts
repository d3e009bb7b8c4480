/** The only relic state listed on the market; the others are Exceptional, Flawless and Radiant. */
export const INTACT = "Intact";

/** One reward line of a relic drop table. Chance is a percentage. */
export interface RewardEntry {
  itemName: string;
  rarity: string;
  chance: number;
}

/** Relic record as the drop-table feed ships it. */
export interface RawRelicRecord {
  tier: string;
  relicName: string;
  state: string;
  rewards: RewardEntry[];
}

export interface DropTableDocument {
  relics: RawRelicRecord[];
}

export interface Relic {
  /** Display name, "{tier} {baseName} {state}". */
  relicName: string;
  tier: string;
  baseName: string;
  state: string;
  urlName: string;
  rewards: RewardEntry[];
  value: number;
  /** Market price of the relic itself; only known for Intact relics. */
  price: number | null;
}

export type RelicMap = Record<string, Relic>;

export interface RelicCatalogSnapshot {
  /** Seconds since epoch of the last feed refresh. */
  timestamp: number;
  relics: RelicMap;
}

export interface Item {
  itemName: string;
  rarity: string;
  chance: number;
  urlName: string;
}

export type ItemCatalog = Record<string, Item>;
