/** "live" prices from open sell orders, "statistics" from closed-trade history. */
export type PriceMode = "live" | "statistics";

/** Which end of the sorted statistics window is averaged. */
export type StatisticsPolicy = "oldest" | "recent";

export interface StatisticsOptions {
  window: string;
  sampleSize: number;
  policy: StatisticsPolicy;
}

/** Price per entity name, in platinum. NO_PRICE marks an entity without usable data. */
export type PriceIndex = Record<string, number>;

export const NO_PRICE = Number.POSITIVE_INFINITY;

export interface RankingEntry {
  relicName: string;
  metric: number;
}

export interface Rankings {
  value: RankingEntry[];
  profit: RankingEntry[];
}

export type RankingMode = keyof Rankings;

export const RANKING_MODES: RankingMode[] = ["value", "profit"];
